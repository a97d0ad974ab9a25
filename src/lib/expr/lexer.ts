/**
 * Expression Lexer
 * Pulls one token at a time from the input using longest-match scanning
 */

import { float64, type NumericType } from "./numeric.ts";
import { isPunctuation, type Punctuation } from "./operators.ts";

// =============================================================================
// TOKEN TYPES
// =============================================================================

export interface NumberToken<T> {
  kind: "number";
  value: T;
  text: string;
  position: number;
}

export interface IdentToken {
  kind: "ident";
  text: string;
  position: number;
}

export interface PunctuationToken {
  kind: Punctuation;
  position: number;
}

/** End of line or end of input */
export interface EndToken {
  kind: "end";
  position: number;
}

/** Characters no pattern matches */
export interface InvalidToken {
  kind: "invalid";
  text: string;
  position: number;
}

export type Token<T> = NumberToken<T> | IdentToken | PunctuationToken | EndToken | InvalidToken;

export type TokenKind = Token<unknown>["kind"];

/** Pattern families, in the order ties are broken */
export type TokenFamily = "number" | "ident" | "punctuation";

export const IDENT_PATTERN = /^[A-Za-z]+[A-Za-z0-9]*$/;

/** Raised when a token matches several families; the first family wins */
export interface LexerDiagnostic {
  code: "ambiguous-token";
  message: string;
  fragment: string;
  position: number;
  families: TokenFamily[];
}

export type WarningSink = (diagnostic: LexerDiagnostic) => void;

/**
 * Render a token kind the way grammar errors print it
 *
 * @example
 * describeToken({ kind: "ident", text: "x", position: 0 }); // "identifier"
 * describeToken({ kind: "+", position: 3 });               // "'+'"
 */
export function describeToken(token: Token<unknown>): string {
  switch (token.kind) {
    case "number":
      return "number";
    case "ident":
      return "identifier";
    case "end":
      return "end";
    case "invalid":
      return "invalid";
    default:
      return `'${token.kind}'`;
  }
}

/** Every family whose pattern matches the whole candidate */
export function matchFamilies<T>(candidate: string, type: NumericType<T>): TokenFamily[] {
  const families: TokenFamily[] = [];
  if (type.literal.test(candidate)) families.push("number");
  if (IDENT_PATTERN.test(candidate)) families.push("ident");
  if (isPunctuation(candidate)) families.push("punctuation");
  return families;
}

// =============================================================================
// LEXER
// =============================================================================

export class Lexer<T> {
  private pos = 0;

  constructor(
    private readonly input: string,
    private readonly type: NumericType<T>,
    private readonly onWarning?: WarningSink,
  ) {}

  /** Offset of the next unread character */
  get position(): number {
    return this.pos;
  }

  /**
   * Read the next token.
   * Grows a candidate one character at a time while some pattern still
   * matches it, then pushes the last character back.
   */
  next(): Token<T> {
    let candidate = "";
    let longest = "";
    let families: TokenFamily[] = [];
    let start = this.pos;

    while (this.pos < this.input.length) {
      const c = this.input.charAt(this.pos++);

      // outside any match: skip blanks, stop at a newline
      if (families.length === 0) {
        if (c === " " || c === "\t") continue;
        if (c === "\n") return { kind: "end", position: this.pos - 1 };
        start = this.pos - 1;
      }

      candidate += c;
      const matching = matchFamilies(candidate, this.type);
      if (matching.length === 0) {
        if (families.length > 0) this.pos--; // push back
        break;
      }
      longest = candidate;
      families = matching;
    }

    const family = families[0];
    if (family === undefined) {
      if (candidate === "") return { kind: "end", position: this.pos };
      return { kind: "invalid", text: candidate, position: start };
    }

    if (families.length > 1) {
      this.onWarning?.({
        code: "ambiguous-token",
        message: `Ambiguous match in lexer for token "${longest}".`,
        fragment: longest,
        position: start,
        families,
      });
    }

    return this.makeToken(family, longest, start);
  }

  private makeToken(family: TokenFamily, text: string, position: number): Token<T> {
    switch (family) {
      case "number":
        return { kind: "number", value: this.type.parseLiteral(text), text, position };
      case "ident":
        return { kind: "ident", text, position };
      case "punctuation":
        if (isPunctuation(text)) return { kind: text, position };
        return { kind: "invalid", text, position };
    }
  }
}

// =============================================================================
// STANDALONE TOKENIZATION
// =============================================================================

function* tokenStream<T>(lexer: Lexer<T>): Generator<Token<T>, void, undefined> {
  while (true) {
    const token = lexer.next();
    yield token;
    if (token.kind === "end" || token.kind === "invalid") return;
  }
}

/**
 * Lazily tokenize an expression, ending with the first end or invalid token
 *
 * @example
 * [...tokenize("12.5e3*x")].map((t) => t.kind);
 * // ["number", "*", "ident", "end"]
 */
export function tokenize(input: string): Generator<Token<number>, void, undefined>;
export function tokenize<T>(
  input: string,
  type: NumericType<T>,
  onWarning?: WarningSink,
): Generator<Token<T>, void, undefined>;
export function tokenize<T>(
  input: string,
  type?: NumericType<T>,
  onWarning?: WarningSink,
): Generator<Token<T> | Token<number>, void, undefined> {
  if (type === undefined) return tokenStream(new Lexer(input, float64, onWarning));
  return tokenStream(new Lexer(input, type, onWarning));
}
