/**
 * Built-in Function Registry
 * Three tables keyed by name, one per arity. A name may appear in several
 * tables (rand() and rand(a, b)); a call only consults the table matching
 * its argument count.
 */

import { UnknownFunctionError } from "./errors.ts";
import { erf, erfc } from "./math.ts";
import type { NumericType } from "./numeric.ts";
import type { RandomSource } from "./random.ts";

export type NullaryFunction<T> = () => T;
export type UnaryFunction<T> = (x: T) => T;
export type BinaryFunction<T> = (x: T, y: T) => T;

export type Arity = 0 | 1 | 2;

export interface FunctionInfo {
  name: string;
  arity: Arity;
}

/** C-style round: halves go away from zero (Math.round sends -2.5 to -2) */
function roundHalfAway(x: number): number {
  return Math.sign(x) * Math.round(Math.abs(x));
}

/** One-argument built-ins, evaluated in double precision */
const UNARY_MATH: Record<string, (x: number) => number> = {
  sin: Math.sin,
  cos: Math.cos,
  tan: Math.tan,
  asin: Math.asin,
  acos: Math.acos,
  atan: Math.atan,

  sinh: Math.sinh,
  cosh: Math.cosh,
  tanh: Math.tanh,
  asinh: Math.asinh,
  acosh: Math.acosh,
  atanh: Math.atanh,

  sqrt: Math.sqrt,
  cbrt: Math.cbrt,

  exp: Math.exp,
  log: Math.log,
  log10: Math.log10,
  log2: Math.log2,

  round: roundHalfAway,
  ceil: Math.ceil,
  floor: Math.floor,
  abs: Math.abs,

  erf,
  erfc,
};

export class FunctionRegistry<T> {
  private readonly nullary = new Map<string, NullaryFunction<T>>();
  private readonly unary = new Map<string, UnaryFunction<T>>();
  private readonly binary = new Map<string, BinaryFunction<T>>();

  constructor(type: NumericType<T>, random: RandomSource) {
    this.nullary.set("rand", () => type.random(random));

    for (const [name, fn] of Object.entries(UNARY_MATH)) {
      const exact = type.exact?.[name];
      this.unary.set(name, exact ?? ((x) => type.fromNumber(fn(type.toNumber(x)))));
    }

    this.binary.set("pow", (x, y) => type.power(x, y));
    this.binary.set("atan2", (y, x) => type.fromNumber(Math.atan2(type.toNumber(y), type.toNumber(x))));
    this.binary.set("rand", (min, max) => type.randomBetween(random, min, max));
    this.binary.set("mod", (x, y) => type.remainder(x, y));
  }

  has(name: string, arity: Arity): boolean {
    switch (arity) {
      case 0:
        return this.nullary.has(name);
      case 1:
        return this.unary.has(name);
      case 2:
        return this.binary.has(name);
    }
  }

  call0(name: string): T {
    const fn = this.nullary.get(name);
    if (!fn) throw new UnknownFunctionError(name, 0);
    return fn();
  }

  call1(name: string, x: T): T {
    const fn = this.unary.get(name);
    if (!fn) throw new UnknownFunctionError(name, 1);
    return fn(x);
  }

  call2(name: string, x: T, y: T): T {
    const fn = this.binary.get(name);
    if (!fn) throw new UnknownFunctionError(name, 2);
    return fn(x, y);
  }

  /** All built-ins sorted by name, then arity (for docs and debugging) */
  list(): FunctionInfo[] {
    const infos: FunctionInfo[] = [
      ...[...this.nullary.keys()].map((name) => ({ name, arity: 0 as const })),
      ...[...this.unary.keys()].map((name) => ({ name, arity: 1 as const })),
      ...[...this.binary.keys()].map((name) => ({ name, arity: 2 as const })),
    ];
    return infos.sort((a, b) => {
      if (a.name !== b.name) return a.name < b.name ? -1 : 1;
      return a.arity - b.arity;
    });
  }
}
