/**
 * Tests for decoding variable bindings supplied as text.
 */
import { describe, it, expect } from "vitest";

import { parseValue, envFromBindings } from "../src/bindings";
import { intVal, floatVal, boolVal, charVal, stringVal } from "../src/value";

describe("parseValue", () => {
  it("parses integers within range", () => {
    expect(parseValue("i32", "42")).toEqual(intVal("i32", 42));
    expect(parseValue("i8", " -128 ")).toEqual(intVal("i8", -128));
    expect(parseValue("u128", "340282366920938463463374607431768211455")).toEqual(
      intVal("u128", 2n ** 128n - 1n)
    );
  });

  it("rejects integers out of range or malformed", () => {
    expect(parseValue("u8", "256")).toBeUndefined();
    expect(parseValue("u8", "-1")).toBeUndefined();
    expect(parseValue("i32", "4.5")).toBeUndefined();
    expect(parseValue("i32", "")).toBeUndefined();
  });

  it("parses floats and their special values", () => {
    expect(parseValue("f64", "3.14")).toEqual(floatVal("f64", 3.14));
    expect(parseValue("f64", "-2e3")).toEqual(floatVal("f64", -2000));
    expect(parseValue("f32", "0.1")).toEqual(floatVal("f32", Math.fround(0.1)));
    expect(parseValue("f64", "inf")).toEqual(floatVal("f64", Infinity));
    expect(parseValue("f64", "-inf")).toEqual(floatVal("f64", -Infinity));
    expect(parseValue("f64", "abc")).toBeUndefined();
  });

  it("parses NaN", () => {
    const value = parseValue("f64", "NaN");
    expect(value?.tag).toBe("f64");
    expect(value !== undefined && "value" in value && Number.isNaN(value.value)).toBe(true);
  });

  it("parses booleans exactly", () => {
    expect(parseValue("bool", "true")).toEqual(boolVal(true));
    expect(parseValue("bool", "false")).toEqual(boolVal(false));
    expect(parseValue("bool", "1")).toBeUndefined();
  });

  it("parses chars with or without quotes", () => {
    expect(parseValue("char", "a")).toEqual(charVal("a"));
    expect(parseValue("char", "'b'")).toEqual(charVal("b"));
    expect(parseValue("char", "ab")).toBeUndefined();
  });

  it("decodes escapes inside quoted chars", () => {
    expect(parseValue("char", "'\\n'")).toEqual(charVal("\n"));
    expect(parseValue("char", "'\\u{e9}'")).toEqual(charVal("\u00e9"));
    expect(parseValue("char", "'\\q'")).toBeUndefined();
  });

  it("parses strings, stripping one pair of quotes", () => {
    expect(parseValue("String", "hello")).toEqual(stringVal("hello"));
    expect(parseValue("&str", '"hello"')).toEqual(stringVal("hello"));
    expect(parseValue("& str", '""')).toEqual(stringVal(""));
  });

  it("returns undefined for non-primitive types", () => {
    expect(parseValue("Vec<i32>", "[1, 2]")).toBeUndefined();
    expect(parseValue("Option<u8>", "Some(1)")).toBeUndefined();
  });
});

describe("envFromBindings", () => {
  it("binds every parseable variable", () => {
    const env = envFromBindings([
      { name: "x", typeName: "i32", value: "10" },
      { name: "ratio", typeName: "f64", value: "0.5" },
    ]);
    expect(env.size).toBe(2);
    expect(env.get("x")).toEqual(intVal("i32", 10));
    expect(env.get("ratio")).toEqual(floatVal("f64", 0.5));
  });

  it("skips bindings that do not parse", () => {
    const env = envFromBindings([
      { name: "ok", typeName: "u8", value: "1" },
      { name: "bad", typeName: "u8", value: "999" },
      { name: "opaque", typeName: "HashMap<String, i32>", value: "{...}" },
    ]);
    expect([...env.entries()].map(([name]) => name)).toEqual(["ok"]);
  });

  it("lets a later binding replace an earlier one", () => {
    const env = envFromBindings([
      { name: "x", typeName: "i32", value: "1" },
      { name: "x", typeName: "u8", value: "2" },
    ]);
    expect(env.get("x")).toEqual(intVal("u8", 2));
  });
});
