/**
 * Expression Errors
 * Every failure raised by the lexer, automaton, or semantic actions
 */

import type { ZodIssue } from "zod";

/** Machine-readable error codes */
export type ExprErrorCode =
  | "LEXICAL"
  | "GRAMMAR"
  | "NOT_ACCEPTED"
  | "UNKNOWN_VARIABLE"
  | "UNKNOWN_FUNCTION"
  | "ASSIGNMENT_TARGET"
  | "NOT_CALLABLE"
  | "EVALUATION"
  | "INVALID_OPTIONS";

export class ExprError extends Error {
  constructor(
    message: string,
    public readonly code: ExprErrorCode,
  ) {
    super(message);
    this.name = "ExprError";
  }
}

// =============================================================================
// SYNTAX
// =============================================================================

/** No token pattern matched the input (or a literal cannot be represented) */
export class LexicalError extends ExprError {
  constructor(
    message: string,
    public readonly fragment: string,
  ) {
    super(message, "LEXICAL");
    this.name = "LexicalError";
  }
}

/** No automaton transition for the current state and lookahead */
export class GrammarError extends ExprError {
  constructor(
    public readonly state: string,
    public readonly token: string,
    public readonly input: string,
  ) {
    super(
      `No transition from ${state} and look-ahead terminal ${token}. Input expression: "${input}".`,
      "GRAMMAR",
    );
    this.name = "GrammarError";
  }
}

/** The automaton stopped without accepting a single value */
export class ParseError extends ExprError {
  constructor(public readonly input: string) {
    super(`Expression "${input}" was not accepted.`, "NOT_ACCEPTED");
    this.name = "ParseError";
  }
}

// =============================================================================
// SEMANTICS
// =============================================================================

export class SemanticError extends ExprError {
  constructor(message: string, code: ExprErrorCode) {
    super(message, code);
    this.name = "SemanticError";
  }
}

export class UnknownVariableError extends SemanticError {
  constructor(public readonly variable: string) {
    super(`Unknown variable "${variable}".`, "UNKNOWN_VARIABLE");
    this.name = "UnknownVariableError";
  }
}

export class UnknownFunctionError extends SemanticError {
  constructor(
    public readonly fn: string,
    public readonly arity: number,
  ) {
    super(
      `Unknown function "${fn}" taking ${arity} argument${arity === 1 ? "" : "s"}.`,
      "UNKNOWN_FUNCTION",
    );
    this.name = "UnknownFunctionError";
  }
}

export class AssignmentTargetError extends SemanticError {
  constructor() {
    super("Assignment needs a variable identifier.", "ASSIGNMENT_TARGET");
    this.name = "AssignmentTargetError";
  }
}

export class NotCallableError extends SemanticError {
  constructor() {
    super("Function call needs an identifier.", "NOT_CALLABLE");
    this.name = "NotCallableError";
  }
}

/** Arithmetic the value type cannot carry out (integer division by zero etc.) */
export class EvaluationError extends SemanticError {
  constructor(message: string) {
    super(message, "EVALUATION");
    this.name = "EvaluationError";
  }
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export class OptionsError extends ExprError {
  constructor(public readonly issues: ZodIssue[]) {
    super(
      `Invalid parser options: ${issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ")}`,
      "INVALID_OPTIONS",
    );
    this.name = "OptionsError";
  }
}
