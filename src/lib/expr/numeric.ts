/**
 * Numeric Value Types
 * The parser is generic over its value type; a NumericType supplies the
 * literal syntax and the arithmetic for one representation
 */

import { EvaluationError, LexicalError } from "./errors.ts";
import type { BinaryOperator } from "./operators.ts";
import type { RandomSource } from "./random.ts";

export interface NumericType<T> {
  /** Short name used in diagnostics */
  readonly name: string;
  /** Anchored pattern a complete numeric literal must match */
  readonly literal: RegExp;

  parseLiteral(text: string): T;
  /** Convert a double (e.g. a Math.* result) into this type */
  fromNumber(n: number): T;
  toNumber(value: T): number;
  isValue(value: unknown): value is T;

  add(a: T, b: T): T;
  subtract(a: T, b: T): T;
  multiply(a: T, b: T): T;
  divide(a: T, b: T): T;
  /** Remainder truncated toward zero, sign of the dividend */
  remainder(a: T, b: T): T;
  power(base: T, exponent: T): T;
  negate(a: T): T;

  /** Uniform over the type's natural range */
  random(source: RandomSource): T;
  randomBetween(source: RandomSource, min: T, max: T): T;

  /** One-argument built-ins computed in this type instead of through a double */
  readonly exact?: Readonly<Record<string, (x: T) => T>>;
}

/** Apply a binary operator using the arithmetic of `type` */
export function applyOperator<T>(type: NumericType<T>, op: BinaryOperator, a: T, b: T): T {
  switch (op) {
    case "+":
      return type.add(a, b);
    case "-":
      return type.subtract(a, b);
    case "*":
      return type.multiply(a, b);
    case "/":
      return type.divide(a, b);
    case "%":
      return type.remainder(a, b);
    case "^":
      return type.power(a, b);
  }
}

// =============================================================================
// FLOAT64
// =============================================================================

/** IEEE-754 doubles with C-style fmod remainder */
export const float64: NumericType<number> = {
  name: "float64",
  literal: /^[0-9]+(\.[0-9]*)?([Ee][+-]?[0-9]*)?$/,

  // "12." and "1e+" are complete literals; parseFloat reads the numeric prefix
  parseLiteral: (text) => Number.parseFloat(text),
  fromNumber: (n) => n,
  toNumber: (value) => value,
  isValue: (value): value is number => typeof value === "number",

  add: (a, b) => a + b,
  subtract: (a, b) => a - b,
  multiply: (a, b) => a * b,
  divide: (a, b) => a / b,
  remainder: (a, b) => a % b,
  power: (base, exponent) => Math.pow(base, exponent),
  negate: (a) => -a,

  random: (source) => source.nextFloat(),
  randomBetween: (source, min, max) => min + source.nextFloat() * (max - min),
};

// =============================================================================
// INT64
// =============================================================================

const INT64_MAX = (1n << 63n) - 1n;
const TWO_POW_64 = 1n << 64n;

/** Two's complement wrap-around, as a fixed-width machine integer */
function wrap(value: bigint): bigint {
  return BigInt.asIntN(64, value);
}

function randomU64(source: RandomSource): bigint {
  return (BigInt(source.nextU32()) << 32n) | BigInt(source.nextU32());
}

/** Square-and-multiply, wrapping at every step */
function powerWrapped(base: bigint, exponent: bigint): bigint {
  let result = 1n;
  let b = wrap(base);
  let e = exponent;
  while (e > 0n) {
    if (e & 1n) result = wrap(result * b);
    b = wrap(b * b);
    e >>= 1n;
  }
  return result;
}

/** Signed 64-bit integers held in bigints; overflow wraps */
export const int64: NumericType<bigint> = {
  name: "int64",
  literal: /^[0-9]+$/,

  parseLiteral(text) {
    const value = BigInt(text);
    if (value > INT64_MAX) {
      throw new LexicalError(`Integer literal "${text}" is out of range.`, text);
    }
    return value;
  },

  fromNumber(n) {
    if (!Number.isFinite(n)) {
      throw new EvaluationError(`Result ${n} is not representable as an integer.`);
    }
    return wrap(BigInt(Math.trunc(n)));
  },
  toNumber: (value) => Number(value),
  isValue: (value): value is bigint => typeof value === "bigint",

  add: (a, b) => wrap(a + b),
  subtract: (a, b) => wrap(a - b),
  multiply: (a, b) => wrap(a * b),

  divide(a, b) {
    if (b === 0n) throw new EvaluationError("Integer division by zero.");
    return wrap(a / b);
  },

  remainder(a, b) {
    if (b === 0n) throw new EvaluationError("Integer remainder by zero.");
    return a % b;
  },

  // Negative exponents truncate toward zero like a cast of the real power
  power(base, exponent) {
    if (exponent >= 0n) return powerWrapped(base, exponent);
    if (base === 0n) throw new EvaluationError("Zero raised to a negative power.");
    if (base === 1n) return 1n;
    if (base === -1n) return exponent % 2n === 0n ? 1n : -1n;
    return 0n;
  },

  negate: (a) => wrap(-a),

  random: (source) => wrap(randomU64(source)),

  // integers are already whole; abs(INT64_MIN) wraps to itself
  exact: {
    abs: (x) => wrap(x < 0n ? -x : x),
    round: (x) => x,
    ceil: (x) => x,
    floor: (x) => x,
  },

  /** Inclusive on both ends; rejection sampling keeps it unbiased */
  randomBetween(source, min, max) {
    const lo = min <= max ? min : max;
    const hi = min <= max ? max : min;
    const span = hi - lo + 1n;
    if (span >= TWO_POW_64) return wrap(randomU64(source));
    const limit = TWO_POW_64 - (TWO_POW_64 % span);
    let draw = randomU64(source);
    while (draw >= limit) draw = randomU64(source);
    return lo + (draw % span);
  },
};
