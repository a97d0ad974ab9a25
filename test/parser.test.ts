/**
 * Tests for the recursive-ascent expression parser
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  createParser,
  EvaluationError,
  evaluateExpression,
  ExprParser,
  float64,
  GrammarError,
  int64,
  LexicalError,
  type NumericType,
  SeededRandomSource,
  UnknownFunctionError,
  UnknownVariableError,
} from "../src/lib/expr";

// =============================================================================
// ARITHMETIC AND PRECEDENCE
// =============================================================================

describe("ExprParser arithmetic", () => {
  const parser = createParser();

  test("literals", () => {
    expect(parser.parse("42")).toBe(42);
    expect(parser.parse("12.5e3")).toBe(12500);
    expect(parser.parse("0.25")).toBe(0.25);
  });

  test("multiplication binds tighter than addition", () => {
    expect(parser.parse("2+3*4")).toBe(14);
    expect(parser.parse("2*3+4")).toBe(10);
  });

  test("left-associative operators", () => {
    expect(parser.parse("10-4-3")).toBe(3);
    expect(parser.parse("100/10/5")).toBe(2);
    expect(parser.parse("7%4*2")).toBe(6);
  });

  test("power is right-associative", () => {
    expect(parser.parse("2^3^2")).toBe(512);
  });

  test("power binds tighter than a sign", () => {
    expect(parser.parse("-2^2")).toBe(-4);
    expect(parser.parse("2^-1")).toBe(0.5);
  });

  test("signs", () => {
    expect(parser.parse("2*-3")).toBe(-6);
    expect(parser.parse("-2+3")).toBe(1);
    expect(parser.parse("--2")).toBe(2);
    expect(parser.parse("+-+3")).toBe(-3);
  });

  test("parentheses", () => {
    expect(parser.parse("(2+3)*4")).toBe(20);
    expect(parser.parse("((((1))))")).toBe(1);
    expect(parser.parse("-(2+3)")).toBe(-5);
  });

  test("whitespace is insignificant", () => {
    expect(parser.parse("  3 *\t4  ")).toBe(12);
  });

  test("newline ends the expression", () => {
    expect(parser.parse("1 + 2\nthis is ignored")).toBe(3);
  });

  test("float division by zero", () => {
    expect(parser.parse("1/0")).toBe(Infinity);
  });

  test("parsing is repeatable", () => {
    expect(parser.parse("1+2")).toBe(3);
    expect(parser.parse("1+2")).toBe(3);
  });

  test("expressions without assignment leave the variables alone", () => {
    const fresh = createParser();
    const before = [...fresh.variables()];
    for (let i = 0; i < 3; i++) {
      expect(fresh.parse("2+2")).toBe(4);
    }
    expect([...fresh.variables()]).toEqual(before);
  });

  test.each(["2+3*4", "-2^2", "1+x=3", "pow(2,3)^2", "-3+4", "2^3^2", "sin(0)+1"])(
    "wrapping %s in parentheses keeps its value",
    (expression) => {
      const bare = createParser();
      const wrapped = createParser();
      expect(wrapped.parse(`(${expression})`)).toBe(bare.parse(expression));
      expect(wrapped.variables()).toEqual(bare.variables());
    },
  );
});

// =============================================================================
// VARIABLES AND ASSIGNMENT
// =============================================================================

describe("ExprParser variables", () => {
  let parser: ExprParser<number>;

  beforeEach(() => {
    parser = createParser();
  });

  test("pi is predefined", () => {
    expect(parser.parse("pi")).toBe(Math.PI);
    expect(parser.parse("2 * pi")).toBe(2 * Math.PI);
  });

  test("assignment yields the value and persists", () => {
    expect(parser.parse("x = 5")).toBe(5);
    expect(parser.parse("x * 3")).toBe(15);
    expect(parser.getVariable("x")).toBe(5);
  });

  test("assignment takes the whole right-hand side", () => {
    expect(parser.parse("x = 2 + 3")).toBe(5);
    expect(parser.getVariable("x")).toBe(5);
  });

  test("chained assignment", () => {
    expect(parser.parse("x = y = 2")).toBe(2);
    expect(parser.getVariable("x")).toBe(2);
    expect(parser.getVariable("y")).toBe(2);
  });

  test("assignment inside a larger expression", () => {
    expect(parser.parse("y = (x = 4) * 2")).toBe(8);
    expect(parser.getVariable("x")).toBe(4);
    expect(parser.getVariable("y")).toBe(8);
  });

  test("assignment as a right operand", () => {
    expect(parser.parse("1 + x = 3")).toBe(4);
    expect(parser.getVariable("x")).toBe(3);
  });

  test("variables can be reassigned", () => {
    parser.parse("n = 1");
    parser.parse("n = n + 1");
    expect(parser.parse("n")).toBe(2);
  });

  test("names are case-sensitive", () => {
    expect(() => parser.parse("Pi")).toThrow('Unknown variable "Pi".');
  });

  test("unknown variable", () => {
    expect(() => parser.parse("q + 1")).toThrow(UnknownVariableError);
  });

  test("assignments made before a failure are kept", () => {
    expect(() => parser.parse("(w = 3) + q")).toThrow(UnknownVariableError);
    expect(parser.getVariable("w")).toBe(3);

    expect(() => parser.parse("pow(v = 5, 1, 2)")).toThrow(GrammarError);
    expect(parser.getVariable("v")).toBe(5);
  });
});

// =============================================================================
// FUNCTION CALLS
// =============================================================================

describe("ExprParser functions", () => {
  const parser = createParser({ random: new SeededRandomSource(1) });

  test("one argument", () => {
    expect(parser.parse("sin(0)")).toBe(0);
    expect(parser.parse("sqrt(16) + 1")).toBe(5);
    expect(parser.parse("abs(-3)")).toBe(3);
  });

  test("two arguments", () => {
    expect(parser.parse("pow(2, 10)")).toBe(1024);
    expect(parser.parse("mod(7, 4)")).toBe(3);
    expect(parser.parse("atan2(1, 1) * 4")).toBeCloseTo(Math.PI, 15);
  });

  test("nested calls and expressions as arguments", () => {
    expect(parser.parse("sqrt(pow(3, 2) + 16)")).toBe(5);
    expect(parser.parse("pow(1 + 1, 2 * 3)")).toBe(64);
  });

  test("rand with no arguments and with bounds", () => {
    const unit = parser.parse("rand()");
    expect(unit >= 0 && unit < 1).toBe(true);
    const bounded = parser.parse("rand(10, 20)");
    expect(bounded >= 10 && bounded < 20).toBe(true);
  });

  test("unknown function", () => {
    expect(() => parser.parse("max(1, 2)")).toThrow(UnknownFunctionError);
    expect(() => parser.parse("max(1, 2)")).toThrow('Unknown function "max" taking 2 arguments.');
  });

  test("known name with the wrong number of arguments", () => {
    expect(() => parser.parse("sin(1, 2)")).toThrow('Unknown function "sin" taking 2 arguments.');
    expect(() => parser.parse("foo()")).toThrow('Unknown function "foo" taking 0 arguments.');
  });
});

// =============================================================================
// SYNTAX ERRORS
// =============================================================================

describe("ExprParser syntax errors", () => {
  const parser = createParser();

  function grammarError(expression: string): GrammarError {
    try {
      parser.parse(expression);
    } catch (error) {
      if (error instanceof GrammarError) return error;
      throw error;
    }
    throw new Error(`"${expression}" parsed without error`);
  }

  test("message names the state, look-ahead and input", () => {
    expect(() => parser.parse("1+")).toThrow(
      'No transition from addAfterOp and look-ahead terminal end. Input expression: "1+".',
    );
  });

  test.each([
    ["", "start", "end"],
    ["1)", "afterExpr", "')'"],
    ["5=3", "afterNumber", "'='"],
    ["2 3", "afterNumber", "number"],
    ["sin 1", "afterIdent", "number"],
    ["(1", "bracketAfterExpr", "end"],
    ["(pi)=3", "afterBracketExpr", "'='"],
    ["2*", "mulAfterOp", "end"],
    ["foo(1,2,3)", "callAfterArg2", "','"],
    ["f(1", "callAfterArg", "end"],
    ["x = )", "assignAfterIdent", "')'"],
  ])("%j fails in %s on %s", (expression, state, token) => {
    const error = grammarError(expression);
    expect(error.state).toBe(state);
    expect(error.token).toBe(token);
    expect(error.input).toBe(expression);
    expect(error.code).toBe("GRAMMAR");
  });

  test("invalid characters are lexical errors", () => {
    expect(() => parser.parse("2 $ 3")).toThrow(LexicalError);
    expect(() => parser.parse("2 $ 3")).toThrow('Invalid input in lexer: "$" at position 2.');
    expect(() => parser.parse("1.2.3")).toThrow('Invalid input in lexer: "." at position 3.');
  });
});

// =============================================================================
// NON-THROWING API
// =============================================================================

describe("tryParse", () => {
  test("returns the value on success", () => {
    expect(createParser().tryParse("2 + 2")).toEqual({ value: 4 });
  });

  test("returns library errors", () => {
    const result = createParser().tryParse("1+");
    expect(result.value).toBeNull();
    expect(result.error).toBeInstanceOf(GrammarError);
  });

  test("rethrows anything else", () => {
    const broken: NumericType<number> = {
      ...float64,
      add: () => {
        throw new TypeError("add failed");
      },
    };
    const parser = new ExprParser({ type: broken });
    expect(() => parser.tryParse("1 + 1")).toThrow(TypeError);
  });
});

describe("evaluateExpression", () => {
  test("binds the given variables", () => {
    expect(evaluateExpression("a * b + 1", { a: 2, b: 3 })).toEqual({ value: 7 });
  });

  test("reports errors", () => {
    const result = evaluateExpression("q");
    expect(result.error).toBeInstanceOf(UnknownVariableError);
  });

  test("does not share state between calls", () => {
    evaluateExpression("z = 1");
    expect(evaluateExpression("z").error).toBeInstanceOf(UnknownVariableError);
  });
});

// =============================================================================
// INT64
// =============================================================================

describe("ExprParser with int64", () => {
  const INT64_MIN = -(1n << 63n);
  let parser: ExprParser<bigint>;

  beforeEach(() => {
    parser = new ExprParser({ type: int64 });
  });

  test("integer division truncates toward zero", () => {
    expect(parser.parse("7/2")).toBe(3n);
    expect(parser.parse("-7/2")).toBe(-3n);
    expect(parser.parse("7 % -3")).toBe(1n);
  });

  test("overflow wraps", () => {
    expect(parser.parse("2^63")).toBe(INT64_MIN);
    expect(parser.parse("2^64")).toBe(0n);
    expect(parser.parse("9223372036854775807 + 1")).toBe(INT64_MIN);
  });

  test("negative exponent", () => {
    expect(parser.parse("2^-1")).toBe(0n);
  });

  test("pi is truncated", () => {
    expect(parser.parse("pi")).toBe(3n);
  });

  test("math functions truncate", () => {
    expect(parser.parse("sqrt(17)")).toBe(4n);
  });

  test("abs is exact for large magnitudes", () => {
    expect(parser.parse("abs(9007199254740993)")).toBe(9007199254740993n);
    expect(parser.parse("abs(0-9223372036854775807)")).toBe(9223372036854775807n);
  });

  test("rand with equal bounds", () => {
    expect(parser.parse("rand(5, 5)")).toBe(5n);
  });

  test("division by zero", () => {
    expect(() => parser.parse("1/0")).toThrow(EvaluationError);
    expect(() => parser.parse("1/0")).toThrow("Integer division by zero.");
  });

  test("fractional literals are rejected", () => {
    expect(() => parser.parse("1.5")).toThrow('Invalid input in lexer: "." at position 1.');
  });

  test("out-of-range literal", () => {
    expect(() => parser.parse("9223372036854775808")).toThrow(LexicalError);
  });
});

// =============================================================================
// VARIABLE MANAGEMENT / CONFIGURATION
// =============================================================================

describe("variable management", () => {
  test("set, has and delete", () => {
    const parser = createParser();
    expect(parser.setVariable("k", 4)).toBe(4);
    expect(parser.hasVariable("k")).toBe(true);
    expect(parser.parse("k^2")).toBe(16);
    expect(parser.deleteVariable("k")).toBe(true);
    expect(parser.hasVariable("k")).toBe(false);
    expect(() => parser.getVariable("k")).toThrow(UnknownVariableError);
  });

  test("clear removes pi, reset restores it", () => {
    const parser = createParser();
    parser.clearVariables();
    expect(parser.variables().size).toBe(0);
    expect(() => parser.parse("pi")).toThrow(UnknownVariableError);

    parser.resetVariables();
    expect(parser.parse("pi")).toBe(Math.PI);
  });

  test("constants are present from the start and after reset", () => {
    const parser = createParser({ constants: { e: Math.E, g: 9.81 } });
    expect(parser.parse("g * 2")).toBe(19.62);
    parser.parse("g = 1");
    parser.resetVariables();
    expect(parser.getVariable("g")).toBe(9.81);
    expect([...parser.variables().keys()]).toEqual(["pi", "e", "g"]);
  });

  test("constants may override pi", () => {
    const parser = createParser({ constants: { pi: 3 } });
    expect(parser.parse("pi")).toBe(3);
  });

  test("variables() is a snapshot", () => {
    const parser = createParser();
    const snapshot = parser.variables();
    parser.parse("late = 1");
    expect(snapshot.has("late")).toBe(false);
  });

  test("numericType and listFunctions", () => {
    const parser = new ExprParser({ type: int64 });
    expect(parser.numericType).toBe(int64);
    expect(parser.listFunctions()).toHaveLength(29);
  });
});

describe("clone", () => {
  test("copies variables without sharing them", () => {
    const parser = createParser();
    parser.parse("x = 1");
    const copy = parser.clone();
    copy.parse("x = 2");
    expect(parser.getVariable("x")).toBe(1);
    expect(copy.getVariable("x")).toBe(2);
  });

  test("keeps the construction-time constants", () => {
    const copy = createParser({ constants: { pi: 3 } }).clone();
    copy.parse("pi = 4");
    copy.resetVariables();
    expect(copy.getVariable("pi")).toBe(3);
  });
});

// =============================================================================
// RANDOMNESS
// =============================================================================

describe("random sources", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("default source is Math.random", () => {
    vi.spyOn(Math, "random").mockReturnValue(0.25);
    const parser = createParser();
    expect(parser.parse("rand()")).toBe(0.25);
    expect(parser.parse("rand(0, 8)")).toBe(2);
  });

  test("equal seeds give equal draws", () => {
    const a = createParser({ random: new SeededRandomSource(5) });
    const b = createParser({ random: new SeededRandomSource(5) });
    expect(a.parse("rand()")).toBe(b.parse("rand()"));
  });

  test("clones share the source", () => {
    const source = new SeededRandomSource(9);
    const reference = new SeededRandomSource(9);
    const copy = createParser({ random: source }).clone();
    expect(copy.parse("rand()")).toBe(reference.nextFloat());
  });
});
