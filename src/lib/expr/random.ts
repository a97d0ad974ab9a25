/**
 * Random Sources
 * Randomness for the rand() built-ins, injectable per parser
 */

export interface RandomSource {
  /** Random float in [0, 1) */
  nextFloat(): number;
  /** Random unsigned 32-bit integer */
  nextU32(): number;
}

/** Backed by Math.random; not reproducible */
export class MathRandomSource implements RandomSource {
  nextFloat(): number {
    return Math.random();
  }

  nextU32(): number {
    return Math.floor(Math.random() * 0x1_0000_0000);
  }
}

/**
 * Mulberry32 generator. Same seed, same sequence.
 *
 * @example
 * const a = new SeededRandomSource(42);
 * const b = new SeededRandomSource(42);
 * a.nextU32() === b.nextU32(); // true
 */
export class SeededRandomSource implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  nextU32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  nextFloat(): number {
    return this.nextU32() / 0x1_0000_0000;
  }
}

/**
 * Process-wide source used by every parser that is not given its own.
 * Each worker thread loads its own copy of this module.
 */
export const sharedRandom: RandomSource = new MathRandomSource();
