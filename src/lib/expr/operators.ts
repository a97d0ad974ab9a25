/**
 * Operator Utilities
 * Punctuation recognized by the lexer and the precedence rules the automaton
 * consults when it has to choose between shifting an operator and reducing
 */

export type Punctuation = "+" | "-" | "*" | "/" | "%" | "^" | "(" | ")" | "," | "=";

export type BinaryOperator = "+" | "-" | "*" | "/" | "%" | "^";

export type UnaryOperator = "+" | "-";

/** All single-character terminals */
export const PUNCTUATION_PATTERN = /^[+\-*/%^(),=]$/;

/**
 * Precedence levels (higher = binds tighter)
 * - Level 1: binary addition/subtraction
 * - Level 2: unary sign
 * - Level 3: multiplication/division/remainder
 * - Level 4: exponentiation
 *
 * A sign sits below the multiplicative operators: -2^2 = -(2^2).
 */
export const OPERATOR_PRECEDENCE: Record<BinaryOperator, number> = {
  "+": 1,
  "-": 1,
  "*": 3,
  "/": 3,
  "%": 3,
  "^": 4,
};

export const UNARY_PRECEDENCE = 2;

/**
 * Right-associative operators
 * 2^3^2 = 2^(3^2) = 512, not (2^3)^2 = 64
 */
export const RIGHT_ASSOCIATIVE: ReadonlySet<BinaryOperator> = new Set(["^"]);

export function isPunctuation(char: string): char is Punctuation {
  return PUNCTUATION_PATTERN.test(char);
}

export function isBinaryOperator(char: string): char is BinaryOperator {
  return Object.hasOwn(OPERATOR_PRECEDENCE, char);
}

export function isUnaryOperator(char: string): char is UnaryOperator {
  return char === "+" || char === "-";
}

export function isRightAssociative(op: BinaryOperator): boolean {
  return RIGHT_ASSOCIATIVE.has(op);
}

/**
 * Decide whether `next` must be shifted before the pending operator is reduced.
 * Left-associative operators of equal precedence reduce first:
 * 8-3-2 = (8-3)-2, while 2^3^2 keeps shifting.
 */
export function bindsTighter(next: BinaryOperator, pending: BinaryOperator | "unary"): boolean {
  const nextPrec = OPERATOR_PRECEDENCE[next];
  const pendingPrec = pending === "unary" ? UNARY_PRECEDENCE : OPERATOR_PRECEDENCE[pending];
  if (nextPrec !== pendingPrec) return nextPrec > pendingPrec;
  return isRightAssociative(next);
}
