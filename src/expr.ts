/**
 * Restricted expression AST.
 * Only the constructs the evaluator can execute have a node here; the
 * converter rejects everything else before an Expr is built.
 */

// ============================================================================
// Path Segments
// ============================================================================

export type PathSegment =
  | IdentSegment
  | IndexSegment
  | TupleIndexSegment
  | DerefSegment
  | RefSegment;

export interface IdentSegment {
  tag: "ident";
  name: string;
}

/** Statically known index: a[3] */
export interface IndexSegment {
  tag: "index";
  index: number;
}

/** Tuple field: a.0 */
export interface TupleIndexSegment {
  tag: "tupleIndex";
  index: number;
}

export interface DerefSegment {
  tag: "deref";
}

export interface RefSegment {
  tag: "ref";
}

export const identSeg = (name: string): IdentSegment => ({ tag: "ident", name });
export const indexSeg = (index: number): IndexSegment => ({ tag: "index", index });
export const tupleIndexSeg = (index: number): TupleIndexSegment => ({ tag: "tupleIndex", index });
export const derefSeg: DerefSegment = { tag: "deref" };
export const refSeg: RefSegment = { tag: "ref" };

// ============================================================================
// Operators
// ============================================================================

export const BINARY_OPS = [
  // Arithmetic
  "+",
  "-",
  "*",
  "/",
  "%",
  // Comparison
  "==",
  "!=",
  "<",
  "<=",
  ">",
  ">=",
  // Logical
  "&&",
  "||",
  // Bitwise
  "&",
  "|",
  "^",
  "<<",
  ">>",
] as const;

export type BinOp = (typeof BINARY_OPS)[number];

export type ArithmeticOp = "+" | "-" | "*" | "/" | "%";
export type ComparisonOp = "==" | "!=" | "<" | "<=" | ">" | ">=";
export type LogicalOp = "&&" | "||";
export type BitwiseOp = "&" | "|" | "^" | "<<" | ">>";

export function isBinOp(text: string): text is BinOp {
  return (BINARY_OPS as readonly string[]).includes(text);
}

export function isComparisonOp(op: string): op is ComparisonOp {
  return op === "==" || op === "!=" || op === "<" || op === "<=" || op === ">" || op === ">=";
}

/**
 * neg: -x, not: !x, deref: *x, ref: &x
 */
export type UnaryOp = "neg" | "not" | "deref" | "ref";

export function unaryOpSymbol(op: UnaryOp): string {
  switch (op) {
    case "neg":
      return "-";
    case "not":
      return "!";
    case "deref":
      return "*";
    case "ref":
      return "&";
  }
}

// ============================================================================
// Literals
// ============================================================================

export type Literal = IntLiteral | FloatLiteral | BoolLiteral | CharLiteral | StringLiteral;

export interface IntLiteral {
  tag: "int";
  value: bigint;
  /** Explicit type suffix, e.g. "u8" in 10u8 */
  suffix?: string;
}

export interface FloatLiteral {
  tag: "float";
  value: number;
  suffix?: string;
}

export interface BoolLiteral {
  tag: "bool";
  value: boolean;
}

export interface CharLiteral {
  tag: "char";
  value: string;
}

export interface StringLiteral {
  tag: "string";
  value: string;
}

// ============================================================================
// Expression Types
// ============================================================================

export type Expr = PathExpr | BinaryExpr | UnaryExpr | LiteralExpr | ParenExpr | CastExpr;

/** Variable or place path: a, a.b, a[0].1 */
export interface PathExpr {
  tag: "path";
  segments: PathSegment[];
}

export interface BinaryExpr {
  tag: "binary";
  op: BinOp;
  left: Expr;
  right: Expr;
}

export interface UnaryExpr {
  tag: "unary";
  op: UnaryOp;
  operand: Expr;
}

export interface LiteralExpr {
  tag: "literal";
  literal: Literal;
}

export interface ParenExpr {
  tag: "paren";
  inner: Expr;
}

/** `operand as targetType`; the type name is checked at evaluation time. */
export interface CastExpr {
  tag: "cast";
  operand: Expr;
  targetType: string;
}

// ============================================================================
// Constructors
// ============================================================================

export const path = (...segments: PathSegment[]): PathExpr => ({ tag: "path", segments });
export const varRef = (name: string): PathExpr => path(identSeg(name));

export const binary = (op: BinOp, left: Expr, right: Expr): BinaryExpr => ({
  tag: "binary",
  op,
  left,
  right,
});

export const unary = (op: UnaryOp, operand: Expr): UnaryExpr => ({ tag: "unary", op, operand });
export const paren = (inner: Expr): ParenExpr => ({ tag: "paren", inner });
export const cast = (operand: Expr, targetType: string): CastExpr => ({
  tag: "cast",
  operand,
  targetType,
});

export const lit = (literal: Literal): LiteralExpr => ({ tag: "literal", literal });

export const int = (value: bigint | number, suffix?: string): LiteralExpr =>
  lit(
    suffix === undefined
      ? { tag: "int", value: BigInt(value) }
      : { tag: "int", value: BigInt(value), suffix }
  );

export const float = (value: number, suffix?: string): LiteralExpr =>
  lit(suffix === undefined ? { tag: "float", value } : { tag: "float", value, suffix });

export const bool = (value: boolean): LiteralExpr => lit({ tag: "bool", value });
export const char = (value: string): LiteralExpr => lit({ tag: "char", value });
export const str = (value: string): LiteralExpr => lit({ tag: "string", value });

// Convenience constructors for common binary operations
export const add = (left: Expr, right: Expr) => binary("+", left, right);
export const sub = (left: Expr, right: Expr) => binary("-", left, right);
export const mul = (left: Expr, right: Expr) => binary("*", left, right);
export const div = (left: Expr, right: Expr) => binary("/", left, right);
export const rem = (left: Expr, right: Expr) => binary("%", left, right);
export const eq = (left: Expr, right: Expr) => binary("==", left, right);
export const lt = (left: Expr, right: Expr) => binary("<", left, right);
export const gt = (left: Expr, right: Expr) => binary(">", left, right);
export const neg = (operand: Expr) => unary("neg", operand);
export const not = (operand: Expr) => unary("not", operand);

// ============================================================================
// Pretty Printing
// ============================================================================

/**
 * Render an expression as Rust-like text. Binary operations are fully
 * parenthesized so the tree shape is visible.
 */
export function exprToString(expr: Expr): string {
  switch (expr.tag) {
    case "path":
      return pathToString(expr.segments);

    case "binary":
      return `(${exprToString(expr.left)} ${expr.op} ${exprToString(expr.right)})`;

    case "unary":
      return `${unaryOpSymbol(expr.op)}${exprToString(expr.operand)}`;

    case "literal":
      return literalToString(expr.literal);

    case "paren":
      // Binary operations already carry their own parentheses
      return expr.inner.tag === "binary"
        ? exprToString(expr.inner)
        : `(${exprToString(expr.inner)})`;

    case "cast":
      return `(${exprToString(expr.operand)} as ${expr.targetType})`;
  }
}

export function pathToString(segments: PathSegment[]): string {
  let prefix = "";
  let body = "";
  for (const segment of segments) {
    switch (segment.tag) {
      case "ident":
        body = body === "" ? segment.name : `${body}.${segment.name}`;
        break;
      case "index":
        body = `${body}[${segment.index}]`;
        break;
      case "tupleIndex":
        body = `${body}.${segment.index}`;
        break;
      case "deref":
        prefix += "*";
        break;
      case "ref":
        prefix += "&";
        break;
    }
  }
  return prefix === "" ? body : `(${prefix}${body})`;
}

export function literalToString(literal: Literal): string {
  switch (literal.tag) {
    case "int":
      return `${literal.value}${literal.suffix ?? ""}`;

    case "float": {
      const text = String(literal.value);
      const withPoint = /^-?\d+$/.test(text) ? `${text}.0` : text;
      return `${withPoint}${literal.suffix ?? ""}`;
    }

    case "bool":
      return String(literal.value);

    case "char":
      return `'${escapeChar(literal.value, "'")}'`;

    case "string":
      return `"${[...literal.value].map((c) => escapeChar(c, '"')).join("")}"`;
  }
}

function escapeChar(c: string, quote: string): string {
  switch (c) {
    case "\n":
      return "\\n";
    case "\r":
      return "\\r";
    case "\t":
      return "\\t";
    case "\0":
      return "\\0";
    case "\\":
      return "\\\\";
    default:
      return c === quote ? `\\${quote}` : c;
  }
}
