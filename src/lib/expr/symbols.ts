/**
 * Operand Stack Symbols and the Variable Table
 */

import { UnknownVariableError } from "./errors.ts";

/** Resolved value */
export interface ValueSymbol<T> {
  kind: "value";
  value: T;
}

/** Identifier whose meaning (read, assignment target, callee) is not decided yet */
export interface IdentSymbol {
  kind: "ident";
  name: string;
}

/** Element of the automaton's operand stack */
export type StackSymbol<T> = ValueSymbol<T> | IdentSymbol;

export function valueSymbol<T>(value: T): ValueSymbol<T> {
  return { kind: "value", value };
}

export function identSymbol(name: string): IdentSymbol {
  return { kind: "ident", name };
}

/** Case-sensitive variable names to values; persists across parse() calls */
export class SymbolTable<T> {
  private readonly vars: Map<string, T>;

  constructor(initial: Iterable<readonly [string, T]> = []) {
    this.vars = new Map(initial);
  }

  /** Read a variable. Throws UnknownVariableError if unset. */
  get(name: string): T {
    const value = this.vars.get(name);
    if (value === undefined) {
      throw new UnknownVariableError(name);
    }
    return value;
  }

  lookup(name: string): T | undefined {
    return this.vars.get(name);
  }

  has(name: string): boolean {
    return this.vars.has(name);
  }

  /** Insert or overwrite; returns the stored value */
  set(name: string, value: T): T {
    this.vars.set(name, value);
    return value;
  }

  delete(name: string): boolean {
    return this.vars.delete(name);
  }

  clear(): void {
    this.vars.clear();
  }

  get size(): number {
    return this.vars.size;
  }

  snapshot(): ReadonlyMap<string, T> {
    return new Map(this.vars);
  }

  clone(): SymbolTable<T> {
    return new SymbolTable(this.vars);
  }
}

/** Value of a stack symbol; identifiers are read from the table */
export function resolve<T>(symbol: StackSymbol<T>, table: SymbolTable<T>): T {
  return symbol.kind === "value" ? symbol.value : table.get(symbol.name);
}
