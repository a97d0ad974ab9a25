/**
 * Expression module barrel export
 * Re-exports the lexer, numeric types, function registry, and parser
 */

export * from "./errors.ts";
export * from "./functions.ts";
export * from "./lexer.ts";
export * from "./math.ts";
export * from "./numeric.ts";
export * from "./operators.ts";
export * from "./options.ts";
export * from "./parser.ts";
export * from "./random.ts";
export * from "./symbols.ts";
