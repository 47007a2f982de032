/**
 * Lezer Tree to Expr AST Conversion
 *
 * Narrows the full Rust expression grammar produced by @lezer/rust down to
 * the restricted AST. Anything outside the supported subset is rejected
 * with an `unsupported` error naming the construct.
 */

import { SyntaxNode } from "@lezer/common";
import {
  Expr,
  BinOp,
  PathSegment,
  lit,
  bool,
  path,
  binary,
  unary,
  paren,
  cast,
  isBinOp,
  isComparisonOp,
  identSeg,
  indexSeg,
  tupleIndexSeg,
  derefSeg,
} from "../expr";
import { parseNumberLiteral, parseCharLiteral, parseStringLiteral } from "./literals";
import { parseError, unsupported, EvalError } from "../errors";

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Get text content of a syntax node.
 */
export function getText(node: SyntaxNode, source: string): string {
  return source.slice(node.from, node.to);
}

const TRIVIA = new Set(["LineComment", "BlockComment"]);

/**
 * Get all direct children, skipping comments.
 */
export function getAllChildren(node: SyntaxNode): SyntaxNode[] {
  const children: SyntaxNode[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (!TRIVIA.has(child.type.name)) children.push(child);
  }
  return children;
}

const PUNCTUATION = new Set(["(", ")", "[", "]", "{", "}", ".", ",", ";", "::", "&", "as", "mut"]);

/**
 * Children that carry meaning: everything except brackets, separators and
 * keywords the grammar keeps as tokens.
 */
function getOperands(node: SyntaxNode): SyntaxNode[] {
  return getAllChildren(node).filter((child) => !PUNCTUATION.has(child.type.name));
}

/**
 * Error for a position the grammar engine could not parse.
 */
export function syntaxErrorAt(source: string, pos: number): EvalError {
  const rest = source.slice(pos).trimEnd();
  if (rest === "") {
    return parseError("unexpected end of input");
  }
  const token = /^(\w+|\S)/.exec(rest.trimStart());
  const column = pos + (rest.length - rest.trimStart().length) + 1;
  return parseError(`unexpected token \`${token ? token[1] : rest}\` at column ${column}`);
}

// ============================================================================
// Expression Conversion
// ============================================================================

/**
 * Convert a Lezer syntax node to an Expr.
 */
export function convertNode(node: SyntaxNode, source: string): Expr {
  if (node.type.isError) {
    throw syntaxErrorAt(source, node.from);
  }

  const typeName = node.type.name;
  switch (typeName) {
    // Literals
    case "Integer":
    case "Float":
      return lit(parseNumberLiteral(getText(node, source)));

    case "Boolean":
      return bool(getText(node, source) === "true");

    case "Char":
      return lit(parseCharLiteral(getText(node, source)));

    case "String":
    case "RawString":
      return lit(parseStringLiteral(getText(node, source)));

    // Variables and places
    case "Identifier":
    case "self": {
      const name = getText(node, source);
      if (name === "true" || name === "false") {
        return bool(name === "true");
      }
      return path(identSeg(name));
    }

    case "ScopedIdentifier":
    case "FieldExpression":
    case "IndexExpression":
      return path(...extractPathSegments(node, source));

    // Operators
    case "BinaryExpression":
      return convertBinaryExpr(node, source);

    case "UnaryExpression":
      return convertUnaryExpr(node, source);

    case "ReferenceExpression": {
      const operand = getOperands(node).pop();
      if (!operand) {
        throw syntaxErrorAt(source, node.to);
      }
      return unary("ref", convertNode(operand, source));
    }

    case "TypeCastExpression":
      return convertCastExpr(node, source);

    case "ParenthesizedExpression": {
      const [inner] = getOperands(node);
      if (!inner) {
        throw parseError("empty parenthesized expression");
      }
      return paren(convertNode(inner, source));
    }

    // Rejected constructs
    case "CallExpression":
      throw unsupported(isMethodCall(node) ? "method calls" : "function calls");

    case "MacroInvocation":
      throw unsupported("macro invocations");

    case "ClosureExpression":
      throw unsupported("closures");

    case "Block":
    case "UnsafeBlock":
    case "AsyncBlock":
    case "ConstBlock":
      throw unsupported("block expressions");

    case "IfExpression":
      throw unsupported("if expressions");

    case "MatchExpression":
      throw unsupported("match expressions");

    case "AssignmentExpression":
    case "CompoundAssignmentExpression":
      throw unsupported("assignment operators");

    default:
      throw unsupported(typeName);
  }
}

/**
 * `a.len()` parses as a call whose callee is a field access.
 */
function isMethodCall(node: SyntaxNode): boolean {
  let callee = node.firstChild;
  if (callee?.type.name === "GenericFunction") {
    callee = callee.firstChild;
  }
  return callee?.type.name === "FieldExpression";
}

function convertBinaryExpr(node: SyntaxNode, source: string): Expr {
  const children = getAllChildren(node);
  if (children.length < 3) {
    throw syntaxErrorAt(source, node.to);
  }

  const left = children[0];
  const opNode = children[1];
  const right = children[children.length - 1];
  const opText = getText(opNode, source);

  if (!isBinOp(opText)) {
    throw unsupported("assignment operators");
  }

  return combine(opText, convertNode(left, source), convertNode(right, source));
}

// Higher binds tighter
const PRECEDENCE: Record<BinOp, number> = {
  "*": 10,
  "/": 10,
  "%": 10,
  "+": 9,
  "-": 9,
  "<<": 8,
  ">>": 8,
  "&": 7,
  "^": 6,
  "|": 5,
  "==": 4,
  "!=": 4,
  "<": 4,
  "<=": 4,
  ">": 4,
  ">=": 4,
  "&&": 3,
  "||": 2,
};

/**
 * Build `left op right`. An unparenthesized left operand that binds looser
 * than `op` can only come from a cast moved onto its rightmost operand
 * (`a + b as i64 * c`), so `op` is rotated down into it.
 */
function combine(op: BinOp, left: Expr, right: Expr): Expr {
  if (left.tag === "binary" && PRECEDENCE[left.op] < PRECEDENCE[op]) {
    return binary(left.op, left.left, combine(op, left.right, right));
  }
  if (isComparisonOp(op) && (isComparison(left) || isComparison(right))) {
    throw parseError("comparison operators cannot be chained");
  }
  return binary(op, left, right);
}

function isComparison(expr: Expr): boolean {
  return expr.tag === "binary" && isComparisonOp(expr.op);
}

function convertUnaryExpr(node: SyntaxNode, source: string): Expr {
  const children = getAllChildren(node);
  if (children.length < 2) {
    throw syntaxErrorAt(source, node.to);
  }

  const opText = getText(children[0], source);
  const operandNode = children[children.length - 1];

  switch (opText) {
    case "-":
      return unary("neg", convertNode(operandNode, source));
    case "!":
      return unary("not", convertNode(operandNode, source));
    case "*":
      return unary("deref", convertNode(operandNode, source));
    default:
      throw unsupported(`unary operator ${opText}`);
  }
}

function convertCastExpr(node: SyntaxNode, source: string): Expr {
  const [operandNode, typeNode] = getOperands(node);
  if (!operandNode || !typeNode || typeNode.type.isError) {
    throw syntaxErrorAt(source, node.to);
  }

  // The type is checked when the cast is evaluated
  const targetType = getText(typeNode, source).replace(/\s+/g, "");
  return castRightmost(convertNode(operandNode, source), targetType);
}

/**
 * The grammar gives `as` the lowest precedence, so `a * b as i64` arrives
 * as a cast of `a * b`. `as` binds tighter than every binary operator, so
 * the cast belongs on the rightmost operand: `a * (b as i64)`.
 */
function castRightmost(operand: Expr, targetType: string): Expr {
  if (operand.tag === "binary") {
    return binary(operand.op, operand.left, castRightmost(operand.right, targetType));
  }
  return cast(operand, targetType);
}

// ============================================================================
// Paths
// ============================================================================

/**
 * Flatten nested field, index and deref chains into path segments.
 *
 * @example
 * a.b[2].0   // [ident a, ident b, index 2, tupleIndex 0]
 * (*p).next  // [deref, ident p, ident next]
 */
function extractPathSegments(node: SyntaxNode, source: string): PathSegment[] {
  switch (node.type.name) {
    case "Identifier":
    case "self":
      return [identSeg(getText(node, source))];

    case "ScopedIdentifier":
      return scopedSegments(node, source);

    case "FieldExpression": {
      const children = getAllChildren(node);
      const base = children[0];
      const member = children[children.length - 1];
      if (children.length < 2 || member === base) {
        throw syntaxErrorAt(source, node.to);
      }
      return [...extractPathSegments(base, source), ...memberSegments(member, source)];
    }

    case "IndexExpression": {
      const [base, index] = getOperands(node);
      if (!base || !index) {
        throw syntaxErrorAt(source, node.to);
      }
      const segments = extractPathSegments(base, source);
      segments.push(indexSeg(staticIndex(index, source)));
      return segments;
    }

    case "UnaryExpression": {
      const children = getAllChildren(node);
      if (children.length >= 2 && getText(children[0], source) === "*") {
        return [derefSeg, ...extractPathSegments(children[children.length - 1], source)];
      }
      throw unsupported("complex path expression");
    }

    case "ParenthesizedExpression": {
      const [inner] = getOperands(node);
      if (!inner) {
        throw parseError("empty parenthesized expression");
      }
      return extractPathSegments(inner, source);
    }

    default:
      if (node.type.isError) {
        throw syntaxErrorAt(source, node.from);
      }
      throw unsupported("complex path expression");
  }
}

/**
 * `mem::size` becomes one ident segment per component.
 */
function scopedSegments(node: SyntaxNode, source: string): PathSegment[] {
  const parts = getText(node, source)
    .replace(/\s+/g, "")
    .split("::")
    .filter((part, i) => !(i === 0 && part === ""));

  if (parts.some((part) => !/^[A-Za-z_][A-Za-z0-9_]*$/.test(part))) {
    throw unsupported("generic paths");
  }
  return parts.map(identSeg);
}

function memberSegments(member: SyntaxNode, source: string): PathSegment[] {
  const text = getText(member, source);
  switch (member.type.name) {
    case "FieldIdentifier":
    case "Identifier":
      return [identSeg(text)];

    case "Integer":
      if (!/^\d+$/.test(text)) {
        throw parseError(`invalid tuple index: ${text}`);
      }
      return [tupleIndexSeg(Number(text))];

    case "Float":
      // `t.0.1` can lex its members as the float `0.1`
      if (!/^\d+\.\d+$/.test(text)) {
        throw parseError(`invalid tuple index: ${text}`);
      }
      return text.split(".").map((part) => tupleIndexSeg(Number(part)));

    default:
      throw syntaxErrorAt(source, member.from);
  }
}

/**
 * An index must be a literal non-negative integer; anything computed
 * would need the debuggee to evaluate it.
 */
function staticIndex(node: SyntaxNode, source: string): number {
  if (node.type.name !== "Integer") {
    throw unsupported("dynamic index");
  }
  const literal = parseNumberLiteral(getText(node, source));
  if (literal.tag !== "int" || literal.value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw parseError(`invalid index: ${getText(node, source)}`);
  }
  return Number(literal.value);
}
