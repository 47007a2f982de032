/**
 * Tests for AST constructors and pretty printing.
 */
import { describe, it, expect } from "vitest";

import {
  path,
  varRef,
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
  unary,
  identSeg,
  indexSeg,
  tupleIndexSeg,
  derefSeg,
  isBinOp,
  exprToString,
} from "../src/expr";

describe("exprToString", () => {
  it("parenthesizes every binary operation", () => {
    expect(exprToString(add(int(1), mul(varRef("a"), int(2))))).toBe("(1 + (a * 2))");
  });

  it("does not double the parentheses of a binary group", () => {
    expect(exprToString(paren(add(varRef("x"), int(1))))).toBe("(x + 1)");
    expect(exprToString(paren(varRef("x")))).toBe("(x)");
  });

  it("prints casts and unary operators", () => {
    expect(exprToString(cast(paren(add(varRef("x"), int(1))), "u8"))).toBe("((x + 1) as u8)");
    expect(exprToString(neg(varRef("x")))).toBe("-x");
    expect(exprToString(not(bool(true)))).toBe("!true");
    expect(exprToString(unary("ref", varRef("v")))).toBe("&v");
  });

  it("prints paths", () => {
    expect(exprToString(path(identSeg("a"), indexSeg(2), tupleIndexSeg(0)))).toBe("a[2].0");
    expect(exprToString(path(identSeg("s"), identSeg("field")))).toBe("s.field");
    expect(exprToString(path(derefSeg, identSeg("p"), identSeg("next")))).toBe("(*p.next)");
  });

  it("prints literals with their suffixes", () => {
    expect(exprToString(int(10, "u8"))).toBe("10u8");
    expect(exprToString(float(1))).toBe("1.0");
    expect(exprToString(float(2.5, "f32"))).toBe("2.5f32");
  });

  it("escapes char and string literals", () => {
    expect(exprToString(char("\n"))).toBe("'\\n'");
    expect(exprToString(char("'"))).toBe("'\\''");
    expect(exprToString(str('a"b'))).toBe('"a\\"b"');
  });
});

describe("isBinOp", () => {
  it("accepts operators and rejects assignment", () => {
    expect(isBinOp("<<")).toBe(true);
    expect(isBinOp("&&")).toBe(true);
    expect(isBinOp("=")).toBe(false);
    expect(isBinOp("+=")).toBe(false);
  });
});
