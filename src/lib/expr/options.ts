/**
 * Parser Options
 * Zod schema for construction-time configuration and its defaults
 */

import { z } from "zod";
import { OptionsError } from "./errors.ts";
import { IDENT_PATTERN, type LexerDiagnostic, type WarningSink } from "./lexer.ts";
import type { NumericType } from "./numeric.ts";
import { type RandomSource, sharedRandom } from "./random.ts";

export interface ParserOptions<T> {
  /** Value type: float64 (number) or int64 (bigint) */
  type: NumericType<T>;
  /** Extra variables present from construction on, next to pi */
  constants?: Record<string, T>;
  /** Source for rand(); defaults to the process-wide source */
  random?: RandomSource;
  /** Receives lexer diagnostics; defaults to console.warn */
  onWarning?: WarningSink;
}

export interface ResolvedParserOptions<T> {
  type: NumericType<T>;
  constants: Record<string, T>;
  random: RandomSource;
  onWarning: WarningSink;
}

// =============================================================================
// SCHEMA
// =============================================================================

const NUMERIC_TYPE_METHODS = [
  "parseLiteral",
  "fromNumber",
  "toNumber",
  "isValue",
  "add",
  "subtract",
  "multiply",
  "divide",
  "remainder",
  "power",
  "negate",
  "random",
  "randomBetween",
] as const satisfies readonly (keyof NumericType<unknown>)[];

function isNumericType(value: unknown): value is NumericType<unknown> {
  if (typeof value !== "object" || value === null) return false;
  const exact: unknown = Reflect.get(value, "exact");
  return (
    "name" in value &&
    typeof value.name === "string" &&
    "literal" in value &&
    value.literal instanceof RegExp &&
    NUMERIC_TYPE_METHODS.every((key) => typeof Reflect.get(value, key) === "function") &&
    (exact === undefined || (typeof exact === "object" && exact !== null))
  );
}

function isRandomSource(value: unknown): value is RandomSource {
  return (
    typeof value === "object" &&
    value !== null &&
    "nextFloat" in value &&
    typeof value.nextFloat === "function" &&
    "nextU32" in value &&
    typeof value.nextU32 === "function"
  );
}

export const ParserOptionsSchema = z
  .object({
    type: z.custom<NumericType<unknown>>(isNumericType, "Expected a numeric type such as float64 or int64"),
    constants: z
      .record(z.string().regex(IDENT_PATTERN, "Constant names must be identifiers"), z.unknown())
      .optional()
      .describe("Initial variables"),
    random: z
      .custom<RandomSource>(isRandomSource, "Expected an object with nextFloat() and nextU32()")
      .optional()
      .describe("Random source for rand()"),
    onWarning: z
      .custom<WarningSink>((v) => typeof v === "function", "Expected a function")
      .optional()
      .describe("Lexer diagnostic sink"),
  })
  .strict()
  .superRefine((opts, ctx) => {
    // refinements still run when `type` itself was rejected
    if (!isNumericType(opts.type)) return;
    for (const [name, value] of Object.entries(opts.constants ?? {})) {
      if (!opts.type.isValue(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["constants", name],
          message: `Expected a value of type ${opts.type.name}`,
        });
      }
    }
  });

function warnToConsole(diagnostic: LexerDiagnostic): void {
  console.warn(`Warning: ${diagnostic.message}`);
}

/** Validate options and fill in defaults. Throws OptionsError. */
export function resolveOptions<T>(options: ParserOptions<T>): ResolvedParserOptions<T> {
  const result = ParserOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new OptionsError(result.error.issues);
  }

  return {
    type: options.type,
    constants: { ...options.constants },
    random: options.random ?? sharedRandom,
    onWarning: options.onWarning ?? warnToConsole,
  };
}
