/**
 * Expression evaluator.
 *
 * A single recursive walk over the restricted AST. Operand types must match
 * exactly: there is no implicit promotion across a binary operator, integer
 * arithmetic is checked at the operands' width, and `as` casts truncate.
 */

import {
  Expr,
  BinOp,
  UnaryOp,
  Literal,
  LiteralExpr,
  IntLiteral,
  PathSegment,
  ArithmeticOp,
  ComparisonOp,
  LogicalOp,
  BitwiseOp,
} from "./expr";
import {
  Value,
  IntValue,
  intVal,
  floatVal,
  boolVal,
  charVal,
  stringVal,
  typeName,
  isIntValue,
  isFloatValue,
  toWideInt,
  toFloat64,
  toBool,
} from "./value";
import {
  IntTypeName,
  intKind,
  intMin,
  isIntTypeName,
  isFloatTypeName,
  fitsIn,
  wrapTo,
  floatToInt,
  literalIntType,
  bigintToFloat,
} from "./numeric";
import { Env } from "./env";
import {
  unsupported,
  unknownVariable,
  invalidOperation,
  divisionByZero,
  internalError,
  parseError,
} from "./errors";

// ============================================================================
// Main Evaluation Function
// ============================================================================

/**
 * Evaluate an expression against a read-only environment.
 * Throws EvalError on the first failure.
 */
export function evaluate(expr: Expr, env: Env): Value {
  switch (expr.tag) {
    case "literal":
      return evalLiteral(expr.literal);

    case "path":
      return evalPath(expr.segments, env);

    case "paren":
      return evaluate(expr.inner, env);

    case "binary": {
      // Both sides are always evaluated, left first; && and || do not short-circuit
      const left = evaluate(expr.left, env);
      const right = evaluate(expr.right, env);
      return applyBinary(left, expr.op, right);
    }

    case "unary":
      return evalUnary(expr.op, expr.operand, env);

    case "cast":
      return castValue(evaluate(expr.operand, env), expr.targetType);
  }
}

/**
 * Evaluator bound to one environment. Instances share nothing, so
 * concurrent callers each use their own.
 */
export class Evaluator {
  constructor(private readonly env: Env = Env.empty()) {}

  get variables(): Env {
    return this.env;
  }

  /**
   * A new evaluator with an additional variable; this one is unchanged.
   */
  withVariable(name: string, value: Value): Evaluator {
    return new Evaluator(this.env.set(name, value));
  }

  eval(expr: Expr): Value {
    return evaluate(expr, this.env);
  }
}

// ============================================================================
// Literals and Paths
// ============================================================================

function evalLiteral(literal: Literal): Value {
  switch (literal.tag) {
    case "int": {
      if (literal.suffix !== undefined) {
        return suffixedInt(literal.value, literal.suffix);
      }
      const type = literalIntType(literal.value);
      if (type === undefined) {
        throw parseError(`integer literal is too large: ${literal.value}`);
      }
      return intVal(type, literal.value);
    }

    case "float":
      return floatVal(literal.suffix === "f32" ? "f32" : "f64", literal.value);

    case "bool":
      return boolVal(literal.value);

    case "char":
      return charVal(literal.value);

    case "string":
      return stringVal(literal.value);
  }
}

function suffixedInt(value: bigint, suffix: string): Value {
  if (isIntTypeName(suffix)) {
    if (!fitsIn(value, suffix)) {
      throw parseError(`literal out of range for ${suffix}: ${value}${suffix}`);
    }
    return intVal(suffix, value);
  }
  if (isFloatTypeName(suffix)) {
    return floatVal(suffix, bigintToFloat(value, suffix));
  }
  throw parseError(`invalid suffix \`${suffix}\` for number literal`);
}

function evalPath(segments: PathSegment[], env: Env): Value {
  const [head, ...rest] = segments;
  if (head === undefined) {
    throw internalError("empty path");
  }
  if (head.tag === "deref" || head.tag === "ref") {
    throw unsupported("dereference/reference operators");
  }
  if (head.tag !== "ident") {
    throw internalError("path must start with an identifier");
  }

  const value = env.get(head.name);
  if (value === undefined) {
    throw unknownVariable(head.name);
  }

  // Reaching into fields and elements needs live-value introspection
  if (rest.length > 0) {
    throw unsupported("field access");
  }

  return value;
}

// ============================================================================
// Binary Operators
// ============================================================================

/**
 * Apply a binary operator to two evaluated operands.
 */
export function applyBinary(left: Value, op: BinOp, right: Value): Value {
  if (typeName(left) !== typeName(right)) {
    throw invalidOperation(op, typeName(left), typeName(right));
  }

  switch (op) {
    case "+":
    case "-":
    case "*":
    case "/":
    case "%":
      return applyArithmetic(left, op, right);

    case "==":
    case "!=":
    case "<":
    case "<=":
    case ">":
    case ">=":
      return applyComparison(left, op, right);

    case "&&":
    case "||":
      return applyLogical(left, op, right);

    case "&":
    case "|":
    case "^":
    case "<<":
    case ">>":
      return applyBitwise(left, op, right);
  }
}

const OVERFLOW_VERBS: Record<ArithmeticOp, string> = {
  "+": "add",
  "-": "subtract",
  "*": "multiply",
  "/": "divide",
  "%": "calculate the remainder",
};

function applyArithmetic(left: Value, op: ArithmeticOp, right: Value): Value {
  const l = toWideInt(left);
  const r = toWideInt(right);
  if (isIntValue(left) && l !== undefined && r !== undefined) {
    let result: bigint;
    switch (op) {
      case "+":
        result = l + r;
        break;
      case "-":
        result = l - r;
        break;
      case "*":
        result = l * r;
        break;
      case "/":
        if (r === 0n) throw divisionByZero();
        result = l / r;
        break;
      case "%":
        if (r === 0n) throw divisionByZero();
        // MIN % -1 overflows the same way MIN / -1 does
        result = r === -1n && l === intMin(left.tag) ? l / r : l % r;
        break;
    }
    return checkedInt(left.tag, result, OVERFLOW_VERBS[op]);
  }

  const lf = toFloat64(left);
  const rf = toFloat64(right);
  if (isFloatValue(left) && lf !== undefined && rf !== undefined) {
    let result: number;
    switch (op) {
      case "+":
        result = lf + rf;
        break;
      case "-":
        result = lf - rf;
        break;
      case "*":
        result = lf * rf;
        break;
      case "/":
        result = lf / rf;
        break;
      case "%":
        result = lf % rf;
        break;
    }
    return floatVal(left.tag, result);
  }

  throw invalidOperation(op, typeName(left), typeName(right));
}

function applyComparison(left: Value, op: ComparisonOp, right: Value): Value {
  const l = toWideInt(left);
  const r = toWideInt(right);
  if (l !== undefined && r !== undefined) {
    return boolVal(compare(op, l, r));
  }

  const lf = toFloat64(left);
  const rf = toFloat64(right);
  if (lf !== undefined && rf !== undefined) {
    return boolVal(compare(op, lf, rf));
  }

  const lb = toBool(left);
  const rb = toBool(right);
  if (lb !== undefined && rb !== undefined) {
    if (op === "==") return boolVal(lb === rb);
    if (op === "!=") return boolVal(lb !== rb);
  }

  throw invalidOperation(op, typeName(left), typeName(right));
}

function compare<T extends bigint | number>(op: ComparisonOp, l: T, r: T): boolean {
  switch (op) {
    case "==":
      return l === r;
    case "!=":
      return l !== r;
    case "<":
      return l < r;
    case "<=":
      return l <= r;
    case ">":
      return l > r;
    case ">=":
      return l >= r;
  }
}

function applyLogical(left: Value, op: LogicalOp, right: Value): Value {
  const l = toBool(left);
  const r = toBool(right);
  if (l === undefined || r === undefined) {
    throw invalidOperation(op, typeName(left), typeName(right));
  }
  return boolVal(op === "&&" ? l && r : l || r);
}

function applyBitwise(left: Value, op: BitwiseOp, right: Value): Value {
  const l = toWideInt(left);
  const r = toWideInt(right);
  if (!isIntValue(left) || l === undefined || r === undefined) {
    throw invalidOperation(op, typeName(left), typeName(right));
  }

  let result: bigint;
  switch (op) {
    case "&":
      result = l & r;
      break;
    case "|":
      result = l | r;
      break;
    case "^":
      result = l ^ r;
      break;
    case "<<":
      result = l << shiftAmount(r);
      break;
    case ">>":
      result = l >> shiftAmount(r);
      break;
  }
  return intVal(left.tag, wrapTo(result, left.tag));
}

/** Only the low 7 bits of the right operand count, as on a 128-bit value. */
function shiftAmount(r: bigint): bigint {
  return BigInt.asUintN(7, r);
}

function checkedInt(tag: IntTypeName, result: bigint, verb: string): IntValue {
  if (!fitsIn(result, tag)) {
    throw internalError(`attempt to ${verb} with overflow`);
  }
  return intVal(tag, result);
}

// ============================================================================
// Unary Operators
// ============================================================================

function evalUnary(op: UnaryOp, operandExpr: Expr, env: Env): Value {
  // Both need memory access into the debuggee
  if (op === "deref" || op === "ref") {
    throw unsupported("dereference/reference operators");
  }
  if (op === "neg" && isNegatableLiteral(operandExpr)) {
    // -2147483648 is an i32, so the sign belongs to the literal
    return evalLiteral({ ...operandExpr.literal, value: -operandExpr.literal.value });
  }
  return applyUnary(op, evaluate(operandExpr, env));
}

function isNegatableLiteral(expr: Expr): expr is LiteralExpr & { literal: IntLiteral } {
  if (expr.tag !== "literal" || expr.literal.tag !== "int") return false;
  const suffix = expr.literal.suffix;
  return suffix === undefined || (isIntTypeName(suffix) && intKind(suffix).signed);
}

/**
 * Apply negation or logical/bitwise not to an evaluated operand.
 */
export function applyUnary(op: "neg" | "not", value: Value): Value {
  if (op === "neg") {
    if (isIntValue(value)) {
      if (!intKind(value.tag).signed) {
        throw invalidOperation("-", typeName(value));
      }
      return checkedInt(value.tag, -value.value, "negate");
    }
    if (isFloatValue(value)) {
      return floatVal(value.tag, -value.value);
    }
    throw invalidOperation("-", typeName(value));
  }

  if (value.tag === "bool") {
    return boolVal(!value.value);
  }
  if (isIntValue(value)) {
    return intVal(value.tag, wrapTo(~value.value, value.tag));
  }
  throw invalidOperation("!", typeName(value));
}

// ============================================================================
// Casts
// ============================================================================

/**
 * `value as targetType`. Integer targets wrap (integers) or saturate
 * (floats); float targets round to their precision.
 */
export function castValue(value: Value, targetType: string): Value {
  const target = targetType.replace(/\s+/g, "");

  if (isIntValue(value)) {
    if (isIntTypeName(target)) {
      return intVal(target, wrapTo(value.value, target));
    }
    if (isFloatTypeName(target)) {
      return floatVal(target, bigintToFloat(value.value, target));
    }
  } else if (isFloatValue(value)) {
    if (isIntTypeName(target)) {
      return intVal(target, floatToInt(value.value, target));
    }
    if (isFloatTypeName(target)) {
      return floatVal(target, value.value);
    }
  }

  throw unsupported(`cast to ${target}`);
}
