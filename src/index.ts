/**
 * Strictly-typed evaluator for Rust expressions.
 */

// Values
export type {
  Value,
  IntValue,
  FloatValue,
  BoolValue,
  CharValue,
  StringValue,
  UnitValue,
  RefValue,
} from "./value";
export {
  intVal,
  floatVal,
  boolVal,
  charVal,
  stringVal,
  unitVal,
  refVal,
  typeName,
  isIntValue,
  isFloatValue,
  isNumeric,
  isInteger,
  isSigned,
  toWideInt,
  toFloat64,
  toBool,
  valueEquals,
  valueToString,
} from "./value";

export type { IntTypeName, FloatTypeName } from "./numeric";
export {
  INT_TYPE_NAMES,
  FLOAT_TYPE_NAMES,
  isIntTypeName,
  isFloatTypeName,
  intMin,
  intMax,
  fitsIn,
  wrapTo,
} from "./numeric";

// Expressions
export type { Expr, PathSegment, BinOp, UnaryOp, Literal } from "./expr";
export {
  path,
  varRef,
  binary,
  unary,
  paren,
  cast,
  lit,
  int,
  float,
  bool,
  char,
  str,
  identSeg,
  indexSeg,
  tupleIndexSeg,
  derefSeg,
  refSeg,
  exprToString,
} from "./expr";

// Parsing
export { parseExpression, parseTree } from "./parser";
export type { HighlightSpan } from "./parser/highlight";
export { highlightSpans, colorize } from "./parser/highlight";

// Evaluation
export { Env } from "./env";
export { evaluate, Evaluator, applyBinary, applyUnary, castValue } from "./evaluate";
export type { EvalOutcome } from "./run";
export { evaluateSource, formatOutcome } from "./run";
export type { VariableBinding } from "./bindings";
export { parseValue, envFromBindings } from "./bindings";

// Errors
export type { EvalErrorDetail, EvalErrorKind } from "./errors";
export { EvalError, formatEvalError } from "./errors";
