export {
  AssignmentTargetError,
  createParser,
  type EvalResult,
  EvaluationError,
  evaluateExpression,
  ExprError,
  type ExprErrorCode,
  ExprParser,
  float64,
  type FunctionInfo,
  GrammarError,
  int64,
  LexicalError,
  type LexerDiagnostic,
  MathRandomSource,
  NotCallableError,
  type NumericType,
  OptionsError,
  ParseError,
  type ParserOptions,
  type RandomSource,
  SeededRandomSource,
  SemanticError,
  sharedRandom,
  type Token,
  tokenize,
  describeToken,
  UnknownFunctionError,
  UnknownVariableError,
  type WarningSink,
} from "./lib/expr/index.ts";
