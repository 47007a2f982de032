/**
 * Tests for error rendering.
 */
import { describe, it, expect } from "vitest";

import {
  EvalError,
  formatEvalError,
  parseError,
  unsupported,
  unknownVariable,
  typeMismatch,
  invalidOperation,
  divisionByZero,
  indexOutOfBounds,
  nullPointer,
  fieldNotFound,
  internalError,
} from "../src/errors";

describe("EvalError", () => {
  it("renders every kind as one line", () => {
    expect(parseError("unexpected end of input").message).toBe(
      "Parse error: unexpected end of input"
    );
    expect(unsupported("closures").message).toBe(
      "Unsupported expression: closures. This feature is not yet implemented."
    );
    expect(unknownVariable("x").message).toBe("Unknown variable: 'x'");
    expect(typeMismatch("bool", "i32").message).toBe("Type mismatch: expected bool, found i32");
    expect(invalidOperation("+", "i32", "u8").message).toBe(
      "Cannot apply operator '+' to types i32 and u8"
    );
    expect(invalidOperation("-", "u8").message).toBe("Cannot apply operator '-' to type u8");
    expect(divisionByZero().message).toBe("Division by zero");
    expect(indexOutOfBounds(5, 3).message).toBe("Index out of bounds: index 5, length 3");
    expect(nullPointer().message).toBe("Null pointer dereference");
    expect(fieldNotFound("len", "Foo").message).toBe("Field 'len' not found on type Foo");
    expect(internalError("oops").message).toBe("Internal error: oops");
  });

  it("is an Error carrying its detail", () => {
    const error = typeMismatch("bool", "i32");
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(EvalError);
    expect(error.name).toBe("EvalError");
    expect(error.kind).toBe("typeMismatch");
    expect(error.detail).toEqual({ kind: "typeMismatch", expected: "bool", found: "i32" });
  });

  it("formats details directly", () => {
    expect(formatEvalError({ kind: "divisionByZero" })).toBe("Division by zero");
  });
});
