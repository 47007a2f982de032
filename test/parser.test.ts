/**
 * Tests for parsing Rust source text into the restricted AST.
 */
import { describe, it, expect } from "vitest";

import { parseExpression } from "../src/parser";
import {
  path,
  varRef,
  binary,
  unary,
  paren,
  cast,
  int,
  float,
  bool,
  char,
  str,
  add,
  mul,
  neg,
  not,
  identSeg,
  indexSeg,
  tupleIndexSeg,
  derefSeg,
  exprToString,
} from "../src/expr";
import { evalErrorOf } from "./helpers";

function unsupportedConstruct(source: string): string | undefined {
  const { detail } = evalErrorOf(() => parseExpression(source));
  return detail.kind === "unsupported" ? detail.construct : undefined;
}

describe("Operators", () => {
  it("follows operator precedence", () => {
    expect(parseExpression("1 + 2 * 3")).toEqual(add(int(1), mul(int(2), int(3))));
  });

  it("keeps explicit grouping", () => {
    expect(parseExpression("(a + b) * c")).toEqual(
      mul(paren(add(varRef("a"), varRef("b"))), varRef("c"))
    );
  });

  it("parses comparison, logical and bitwise operators", () => {
    expect(parseExpression("a <= b")).toEqual(binary("<=", varRef("a"), varRef("b")));
    expect(parseExpression("a && b || c")).toEqual(
      binary("||", binary("&&", varRef("a"), varRef("b")), varRef("c"))
    );
    expect(parseExpression("x << 2")).toEqual(binary("<<", varRef("x"), int(2)));
    expect(parseExpression("x ^ y")).toEqual(binary("^", varRef("x"), varRef("y")));
  });

  it("parses unary operators", () => {
    expect(parseExpression("-x")).toEqual(neg(varRef("x")));
    expect(parseExpression("!flag")).toEqual(not(varRef("flag")));
    expect(parseExpression("*p")).toEqual(unary("deref", varRef("p")));
    expect(parseExpression("&x")).toEqual(unary("ref", varRef("x")));
  });

  it("parses casts", () => {
    expect(parseExpression("x as u8")).toEqual(cast(varRef("x"), "u8"));
    expect(parseExpression("-5i8 as u8")).toEqual(cast(neg(int(5, "i8")), "u8"));
  });

  it("applies a cast to the operand directly before it", () => {
    expect(parseExpression("a * b as i64")).toEqual(mul(varRef("a"), cast(varRef("b"), "i64")));
    expect(parseExpression("a == b as i64")).toEqual(
      binary("==", varRef("a"), cast(varRef("b"), "i64"))
    );
    expect(parseExpression("a + b as i64 * c")).toEqual(
      add(varRef("a"), mul(cast(varRef("b"), "i64"), varRef("c")))
    );
    expect(parseExpression("(a * b) as i64")).toEqual(
      cast(paren(mul(varRef("a"), varRef("b"))), "i64")
    );
  });

  it("rejects chained comparisons", () => {
    expect(evalErrorOf(() => parseExpression("a < b == c")).kind).toBe("parse");
    expect(evalErrorOf(() => parseExpression("a == b != c")).kind).toBe("parse");
    expect(parseExpression("(a < b) == c")).toEqual(
      binary("==", paren(binary("<", varRef("a"), varRef("b"))), varRef("c"))
    );
  });
});

describe("Literals", () => {
  it("parses numbers", () => {
    expect(parseExpression("42")).toEqual(int(42));
    expect(parseExpression("1_000u16")).toEqual(int(1000, "u16"));
    expect(parseExpression("0xff")).toEqual(int(255));
    expect(parseExpression("2.5")).toEqual(float(2.5));
  });

  it("parses booleans, chars and strings", () => {
    expect(parseExpression("true")).toEqual(bool(true));
    expect(parseExpression("false")).toEqual(bool(false));
    expect(parseExpression("'a'")).toEqual(char("a"));
    expect(parseExpression('"hi\\n"')).toEqual(str("hi\n"));
  });
});

describe("Paths", () => {
  it("parses a bare identifier", () => {
    expect(parseExpression("count")).toEqual(varRef("count"));
  });

  it("flattens field and index chains", () => {
    expect(parseExpression("a.b")).toEqual(path(identSeg("a"), identSeg("b")));
    expect(parseExpression("a.b[2]")).toEqual(path(identSeg("a"), identSeg("b"), indexSeg(2)));
    expect(parseExpression("pair.0")).toEqual(path(identSeg("pair"), tupleIndexSeg(0)));
  });

  it("puts a dereferenced base first", () => {
    expect(parseExpression("(*node).next")).toEqual(
      path(derefSeg, identSeg("node"), identSeg("next"))
    );
  });

  it("rejects computed indices", () => {
    expect(unsupportedConstruct("a[i]")).toBe("dynamic index");
  });

  it("rejects fields of non-path bases", () => {
    expect(unsupportedConstruct("(a + b).x")).toBe("complex path expression");
  });
});

describe("Unsupported constructs", () => {
  it("names the construct", () => {
    expect(unsupportedConstruct("foo()")).toBe("function calls");
    expect(unsupportedConstruct("foo(1, 2)")).toBe("function calls");
    expect(unsupportedConstruct("a.len()")).toBe("method calls");
    expect(unsupportedConstruct("|x| x + 1")).toBe("closures");
    expect(unsupportedConstruct("if a { 1 } else { 2 }")).toBe("if expressions");
    expect(unsupportedConstruct("match x { _ => 1 }")).toBe("match expressions");
    expect(unsupportedConstruct("{ 1 }")).toBe("block expressions");
    expect(unsupportedConstruct("x = 1")).toBe("assignment operators");
  });
});

describe("Parse errors", () => {
  it("rejects empty input", () => {
    expect(evalErrorOf(() => parseExpression("")).message).toBe(
      "Parse error: expected an expression"
    );
    expect(evalErrorOf(() => parseExpression("   ")).message).toBe(
      "Parse error: expected an expression"
    );
  });

  it("rejects incomplete expressions", () => {
    expect(evalErrorOf(() => parseExpression("1 +")).kind).toBe("parse");
    expect(evalErrorOf(() => parseExpression("(1")).kind).toBe("parse");
  });

  it("rejects trailing tokens", () => {
    expect(evalErrorOf(() => parseExpression("1 2")).kind).toBe("parse");
    expect(evalErrorOf(() => parseExpression("1; 2")).kind).toBe("parse");
  });

  it("rejects statements", () => {
    expect(evalErrorOf(() => parseExpression("let x = 1")).kind).toBe("parse");
  });

  it("ignores surrounding whitespace", () => {
    expect(parseExpression("  1 + 1\n")).toEqual(add(int(1), int(1)));
  });
});

describe("Round trip through exprToString", () => {
  it("renders the canonical form", () => {
    expect(exprToString(parseExpression("a * (b + 1) as i64"))).toBe("(a * ((b + 1) as i64))");
  });
});
