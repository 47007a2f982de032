/**
 * Lezer-based Rust expression parser.
 *
 * Uses @lezer/rust for the full grammar and narrows the result to the
 * restricted Expr AST.
 *
 * Usage:
 *   import { parseExpression } from "./parser";
 *
 *   const expr = parseExpression("(x + 1) as u8");
 */

import { parser } from "@lezer/rust";
import { SyntaxNode, Tree } from "@lezer/common";
import { Expr } from "../expr";
import { parseError } from "../errors";
import { convertNode, getAllChildren, getText, syntaxErrorAt } from "./convert";

// The grammar only knows statements; a trailing `;` turns the input into
// one, and after a block-like expression it reads as an empty statement
const STATEMENT_SUFFIX = "\n;";

/**
 * Parse source text into the full @lezer/rust syntax tree, as used for
 * expression conversion.
 */
export function parseTree(source: string): Tree {
  return parser.parse(source + STATEMENT_SUFFIX);
}

/**
 * Parse a single Rust expression to an Expr AST.
 *
 * @throws EvalError with a `parse` detail when the text is not one
 * well-formed expression, or `unsupported` when it uses a construct the
 * evaluator does not handle.
 *
 * @example
 * parseExpression("1 + 2")     // binary("+", int(1), int(2))
 * parseExpression("x as u8")   // cast(varRef("x"), "u8")
 * parseExpression("foo()")     // throws: Unsupported expression: function calls
 */
export function parseExpression(source: string): Expr {
  const end = source.trimEnd().length;
  if (source.trim() === "") {
    throw parseError("expected an expression");
  }

  const tree = parseTree(source);
  const [firstError] = findErrors(tree.topNode);
  if (firstError) {
    throw syntaxErrorAt(source, firstError.from);
  }

  const statements = getAllChildren(tree.topNode).filter((node) => node.from < end);
  const [statement] = statements;
  if (!statement) {
    throw parseError("expected an expression");
  }

  return convertNode(expressionOf(statement, source, end), source);
}

/**
 * The expression carried by the first statement of the input.
 */
function expressionOf(statement: SyntaxNode, source: string, end: number): SyntaxNode {
  const name = statement.type.name;
  if (/(Declaration|Item)$/.test(name)) {
    throw parseError(`expected an expression, found ${describeStatement(name)}`);
  }
  if (name === "EmptyStatement") {
    throw syntaxErrorAt(source, statement.from);
  }
  if (name !== "ExpressionStatement") {
    // Macro invocations and the like can stand as statements on their own
    return statement;
  }

  const [expr, ...rest] = getAllChildren(statement);
  if (!expr || getText(expr, source) === ";") {
    throw syntaxErrorAt(source, statement.from);
  }
  // Any `;` written in the input ends the expression early
  const semicolon = rest.find((node) => node.from < end);
  if (semicolon) {
    throw syntaxErrorAt(source, semicolon.from);
  }
  return expr;
}

/**
 * `LetDeclaration` reads as "let declaration", `FunctionItem` as "function item".
 */
function describeStatement(name: string): string {
  return name.replace(/([a-z])([A-Z])/g, "$1 $2").toLowerCase();
}

function findErrors(node: SyntaxNode): SyntaxNode[] {
  const errors: SyntaxNode[] = [];
  const visit = (current: SyntaxNode): void => {
    if (current.type.isError) {
      errors.push(current);
    }
    for (let child = current.firstChild; child; child = child.nextSibling) {
      visit(child);
    }
  };
  visit(node);
  return errors;
}

export { convertNode, getText, getAllChildren } from "./convert";
export { parseNumberLiteral, parseCharLiteral, parseStringLiteral } from "./literals";
