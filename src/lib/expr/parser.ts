/**
 * LR(1) Expression Parser via Recursive Ascent
 *
 * Grammar (precedence low → high):
 *   E → ident = E
 *     | E + E | E - E
 *     | + E | - E
 *     | E * E | E / E | E % E
 *     | E ^ E                      (right-associative)
 *     | ( E ) | number | ident
 *     | ident ( ) | ident ( E ) | ident ( E , E )
 *
 * Every parser item is a method. Shifting calls the successor item; the JS
 * call stack therefore is the LR state stack. A reduction pops as many call
 * frames as its right-hand side has symbols by setting `unwind`, which each
 * returning frame decrements. An item that loops on the goto over E only
 * continues while `unwind` is zero.
 *
 * Recursion depth grows with nesting depth; pathological inputs can
 * overflow the call stack.
 */

import {
  AssignmentTargetError,
  ExprError,
  GrammarError,
  LexicalError,
  NotCallableError,
  ParseError,
} from "./errors.ts";
import { type FunctionInfo, FunctionRegistry } from "./functions.ts";
import { describeToken, Lexer, type Token, type TokenKind, type WarningSink } from "./lexer.ts";
import { applyOperator, float64, type NumericType } from "./numeric.ts";
import { type BinaryOperator, bindsTighter, isBinaryOperator, type UnaryOperator } from "./operators.ts";
import { type ParserOptions, resolveOptions } from "./options.ts";
import type { RandomSource } from "./random.ts";
import { identSymbol, resolve, type StackSymbol, SymbolTable, valueSymbol } from "./symbols.ts";

/** Result of a non-throwing evaluation */
export type EvalResult<T> = { value: T; error?: undefined } | { value: null; error: ExprError };

/** Lookaheads on which a complete operand may be reduced */
function isFollow(kind: TokenKind): boolean {
  return isBinaryOperator(kind) || kind === ")" || kind === "," || kind === "end";
}

export class ExprParser<T> {
  private readonly type: NumericType<T>;
  private readonly random: RandomSource;
  private readonly onWarning: WarningSink;
  private readonly constants: Record<string, T>;
  private readonly functions: FunctionRegistry<T>;
  private symbols: SymbolTable<T>;

  // automaton state, reset by every parse()
  private input = "";
  private lexer: Lexer<T>;
  private lookahead: Token<T> = { kind: "end", position: 0 };
  private stack: StackSymbol<T>[] = [];
  private accepted = false;
  private unwind = 0;

  constructor(options: ParserOptions<T>) {
    const resolved = resolveOptions(options);
    this.type = resolved.type;
    this.random = resolved.random;
    this.onWarning = resolved.onWarning;

    this.constants = resolved.constants;
    this.symbols = this.initialSymbols();
    this.functions = new FunctionRegistry(this.type, this.random);
    this.lexer = new Lexer("", this.type, this.onWarning);
  }

  // ===========================================================================
  // DRIVER
  // ===========================================================================

  /**
   * Evaluate one expression.
   * Assignments take effect as soon as they reduce, even if the expression
   * fails later on.
   *
   * @throws {ExprError} on lexical, grammar, or semantic errors
   */
  parse(expression: string): T {
    this.input = expression;
    this.lexer = new Lexer(expression, this.type, this.onWarning);
    this.stack = [];
    this.accepted = false;
    this.unwind = 0;

    this.nextToken();
    this.start();

    const top = this.stack[0];
    if (!this.accepted || this.stack.length !== 1 || top === undefined) {
      throw new ParseError(expression);
    }
    return resolve(top, this.symbols);
  }

  /** Like parse(), but reports library errors in the result instead of throwing */
  tryParse(expression: string): EvalResult<T> {
    try {
      return { value: this.parse(expression) };
    } catch (error) {
      if (error instanceof ExprError) return { value: null, error };
      throw error;
    }
  }

  // ===========================================================================
  // VARIABLES
  // ===========================================================================

  getVariable(name: string): T {
    return this.symbols.get(name);
  }

  setVariable(name: string, value: T): T {
    return this.symbols.set(name, value);
  }

  hasVariable(name: string): boolean {
    return this.symbols.has(name);
  }

  deleteVariable(name: string): boolean {
    return this.symbols.delete(name);
  }

  /** Remove every variable, pi included */
  clearVariables(): void {
    this.symbols.clear();
  }

  /** Back to pi plus the constants given at construction */
  resetVariables(): void {
    this.symbols = this.initialSymbols();
  }

  variables(): ReadonlyMap<string, T> {
    return this.symbols.snapshot();
  }

  // ===========================================================================
  // MISC
  // ===========================================================================

  get numericType(): NumericType<T> {
    return this.type;
  }

  listFunctions(): FunctionInfo[] {
    return this.functions.list();
  }

  /** Independent copy: same configuration, copied variable table */
  clone(): ExprParser<T> {
    const copy = new ExprParser<T>({
      type: this.type,
      random: this.random,
      onWarning: this.onWarning,
      constants: this.constants,
    });
    copy.symbols = this.symbols.clone();
    return copy;
  }

  // ===========================================================================
  // AUTOMATON PLUMBING
  // ===========================================================================

  private initialSymbols(): SymbolTable<T> {
    return new SymbolTable<T>([["pi", this.type.fromNumber(Math.PI)], ...Object.entries(this.constants)]);
  }

  private nextToken(): void {
    this.lookahead = this.lexer.next();
  }

  private fail(state: string): never {
    const token = this.lookahead;
    if (token.kind === "invalid") {
      throw new LexicalError(`Invalid input in lexer: "${token.text}" at position ${token.position}.`, token.text);
    }
    throw new GrammarError(state, describeToken(token), this.input);
  }

  /** Goto over E: re-enter `item` until a reduction unwinds past this frame */
  private gotoExpr(item: () => void): void {
    while (this.unwind === 0 && this.stack.length > 0 && !this.accepted) {
      item();
    }
  }

  /** Every item returns through here */
  private leave(): void {
    if (this.unwind > 0) this.unwind--;
  }

  private pop(): StackSymbol<T> {
    const symbol = this.stack.pop();
    if (symbol === undefined) throw new ParseError(this.input);
    return symbol;
  }

  private popValue(): T {
    return resolve(this.pop(), this.symbols);
  }

  private push(value: T): void {
    this.stack.push(valueSymbol(value));
  }

  /** Shift anything that can begin an expression */
  private shiftOperand(state: string): void {
    const token = this.lookahead;
    switch (token.kind) {
      case "+":
      case "-":
        this.nextToken();
        this.unaryAfterOp(token.kind);
        break;
      case "(":
        this.nextToken();
        this.afterBracket();
        break;
      case "number":
        this.stack.push(valueSymbol(token.value));
        this.nextToken();
        this.afterNumber();
        break;
      case "ident":
        this.stack.push(identSymbol(token.text));
        this.nextToken();
        this.afterIdent();
        break;
      default:
        this.fail(state);
    }
  }

  /** Shift a binary operator that follows a complete E */
  private shiftOperator(op: BinaryOperator): void {
    this.nextToken();
    switch (op) {
      case "+":
      case "-":
        this.addAfterOp(op);
        break;
      case "*":
      case "/":
      case "%":
        this.mulAfterOp(op);
        break;
      case "^":
        this.powAfterOp();
        break;
    }
  }

  /** E op E• : shift a tighter operator, otherwise reduce */
  private afterBinary(state: string, op: BinaryOperator): void {
    const kind = this.lookahead.kind;
    if (isBinaryOperator(kind) && bindsTighter(kind, op)) {
      this.shiftOperator(kind);
    } else if (isFollow(kind)) {
      this.unwind = 3;
      const rhs = this.popValue();
      const lhs = this.popValue();
      this.push(applyOperator(this.type, op, lhs, rhs));
    } else {
      this.fail(state);
    }
    this.leave();
  }

  // ===========================================================================
  // PARSER ITEMS
  // ===========================================================================

  /** start → •E end */
  private start(): void {
    this.shiftOperand("start");
    this.gotoExpr(() => this.afterExpr());
    this.leave();
  }

  /** start → E •end */
  private afterExpr(): void {
    const kind = this.lookahead.kind;
    if (isBinaryOperator(kind)) {
      this.shiftOperator(kind);
    } else if (kind === "end") {
      this.accepted = true;
    } else {
      this.fail("afterExpr");
    }
    this.leave();
  }

  /** E → + •E */
  private unaryAfterOp(op: UnaryOperator): void {
    this.shiftOperand("unaryAfterOp");
    this.gotoExpr(() => this.afterUnary(op));
    this.leave();
  }

  /** E → + E• */
  private afterUnary(op: UnaryOperator): void {
    const kind = this.lookahead.kind;
    if (isBinaryOperator(kind) && bindsTighter(kind, "unary")) {
      this.shiftOperator(kind);
    } else if (isFollow(kind)) {
      this.unwind = 2;
      const value = this.popValue();
      this.push(op === "-" ? this.type.negate(value) : value);
    } else {
      this.fail("afterUnary");
    }
    this.leave();
  }

  /** E → E + •E */
  private addAfterOp(op: "+" | "-"): void {
    this.shiftOperand("addAfterOp");
    this.gotoExpr(() => this.afterAdd(op));
    this.leave();
  }

  /** E → E + E• */
  private afterAdd(op: "+" | "-"): void {
    this.afterBinary("afterAdd", op);
  }

  /** E → E * •E */
  private mulAfterOp(op: "*" | "/" | "%"): void {
    this.shiftOperand("mulAfterOp");
    this.gotoExpr(() => this.afterMul(op));
    this.leave();
  }

  /** E → E * E• */
  private afterMul(op: "*" | "/" | "%"): void {
    this.afterBinary("afterMul", op);
  }

  /** E → E ^ •E */
  private powAfterOp(): void {
    this.shiftOperand("powAfterOp");
    this.gotoExpr(() => this.afterPow());
    this.leave();
  }

  /** E → E ^ E• */
  private afterPow(): void {
    this.afterBinary("afterPow", "^");
  }

  /** E → ( •E ) */
  private afterBracket(): void {
    this.shiftOperand("afterBracket");
    this.gotoExpr(() => this.bracketAfterExpr());
    this.leave();
  }

  /** E → ( E •) */
  private bracketAfterExpr(): void {
    const kind = this.lookahead.kind;
    if (isBinaryOperator(kind)) {
      this.shiftOperator(kind);
    } else if (kind === ")") {
      this.nextToken();
      this.afterBracketExpr();
    } else {
      this.fail("bracketAfterExpr");
    }
    this.leave();
  }

  /** E → ( E )• */
  private afterBracketExpr(): void {
    if (isFollow(this.lookahead.kind)) {
      this.unwind = 3;
      this.push(this.popValue());
    } else {
      this.fail("afterBracketExpr");
    }
    this.leave();
  }

  /** E → number• */
  private afterNumber(): void {
    if (isFollow(this.lookahead.kind)) {
      this.unwind = 1;
      this.push(this.popValue());
    } else {
      this.fail("afterNumber");
    }
    this.leave();
  }

  /** E → ident• | ident •= E | ident •( ... ) */
  private afterIdent(): void {
    const kind = this.lookahead.kind;
    if (kind === "=") {
      this.nextToken();
      this.assignAfterIdent();
    } else if (kind === "(") {
      this.nextToken();
      this.callAfterIdent();
    } else if (isFollow(kind)) {
      // reading the variable
      this.unwind = 1;
      this.push(this.popValue());
    } else {
      this.fail("afterIdent");
    }
    this.leave();
  }

  /** E → ident = •E */
  private assignAfterIdent(): void {
    this.shiftOperand("assignAfterIdent");
    this.gotoExpr(() => this.afterAssign());
    this.leave();
  }

  /** E → ident = E• */
  private afterAssign(): void {
    const kind = this.lookahead.kind;
    if (isBinaryOperator(kind)) {
      this.shiftOperator(kind);
    } else if (kind === "," || kind === ")" || kind === "end") {
      this.unwind = 3;
      const value = this.popValue();
      const target = this.pop();
      if (target.kind !== "ident") throw new AssignmentTargetError();
      this.push(this.symbols.set(target.name, value));
    } else {
      this.fail("afterAssign");
    }
    this.leave();
  }

  /** E → ident ( •) | ident ( •E ) | ident ( •E , E ) */
  private callAfterIdent(): void {
    if (this.lookahead.kind === ")") {
      this.nextToken();
      this.afterCall0();
    } else {
      this.shiftOperand("callAfterIdent");
    }
    this.gotoExpr(() => this.callAfterArg());
    this.leave();
  }

  /** E → ident ( )• */
  private afterCall0(): void {
    if (isFollow(this.lookahead.kind)) {
      this.unwind = 3;
      const callee = this.pop();
      if (callee.kind !== "ident") throw new NotCallableError();
      this.push(this.functions.call0(callee.name));
    } else {
      this.fail("afterCall0");
    }
    this.leave();
  }

  /** E → ident ( E •) | ident ( E •, E ) */
  private callAfterArg(): void {
    const kind = this.lookahead.kind;
    if (isBinaryOperator(kind)) {
      this.shiftOperator(kind);
    } else if (kind === ",") {
      this.nextToken();
      this.callAfterComma();
    } else if (kind === ")") {
      this.nextToken();
      this.afterCall1();
    } else {
      this.fail("callAfterArg");
    }
    this.leave();
  }

  /** E → ident ( E )• */
  private afterCall1(): void {
    if (isFollow(this.lookahead.kind)) {
      this.unwind = 4;
      const arg = this.popValue();
      const callee = this.pop();
      if (callee.kind !== "ident") throw new NotCallableError();
      this.push(this.functions.call1(callee.name, arg));
    } else {
      this.fail("afterCall1");
    }
    this.leave();
  }

  /** E → ident ( E , •E ) */
  private callAfterComma(): void {
    this.shiftOperand("callAfterComma");
    this.gotoExpr(() => this.callAfterArg2());
    this.leave();
  }

  /** E → ident ( E , E •) */
  private callAfterArg2(): void {
    const kind = this.lookahead.kind;
    if (isBinaryOperator(kind)) {
      this.shiftOperator(kind);
    } else if (kind === ")") {
      this.nextToken();
      this.afterCall2();
    } else {
      this.fail("callAfterArg2");
    }
    this.leave();
  }

  /** E → ident ( E , E )• */
  private afterCall2(): void {
    if (isFollow(this.lookahead.kind)) {
      this.unwind = 6;
      const arg2 = this.popValue();
      const arg1 = this.popValue();
      const callee = this.pop();
      if (callee.kind !== "ident") throw new NotCallableError();
      this.push(this.functions.call2(callee.name, arg1, arg2));
    } else {
      this.fail("afterCall2");
    }
    this.leave();
  }
}

// =============================================================================
// FACTORIES
// =============================================================================

/**
 * Create a float64 parser. For other value types use `new ExprParser({ type })`.
 *
 * @example
 * createParser().parse("2^3^2");                      // 512
 * new ExprParser({ type: int64 }).parse("7 / 2");     // 3n
 */
export function createParser(options: Omit<ParserOptions<number>, "type"> = {}): ExprParser<number> {
  return new ExprParser({ ...options, type: float64 });
}

/**
 * One-shot evaluation with a fresh float64 parser
 *
 * @example
 * evaluateExpression("a * b + 1", { a: 2, b: 3 }); // { value: 7 }
 */
export function evaluateExpression(expression: string, variables: Record<string, number> = {}): EvalResult<number> {
  return createParser({ constants: variables }).tryParse(expression);
}
