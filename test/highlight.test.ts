/**
 * Tests for terminal syntax colouring.
 */
import { describe, it, expect } from "vitest";

import { highlightSpans, colorize } from "../src/parser/highlight";

describe("highlightSpans", () => {
  it("classifies numbers", () => {
    expect(highlightSpans("1 + x")).toContainEqual({ from: 0, to: 1, className: "tok-number" });
  });

  it("leaves whitespace unclassified", () => {
    const spans = highlightSpans("1 + x");
    expect(spans.some((span) => span.from === 1 && span.to === 2)).toBe(false);
  });
});

describe("colorize", () => {
  it("wraps numbers in yellow", () => {
    expect(colorize("42")).toBe("\x1b[33m42\x1b[0m");
  });

  it("keeps the text intact", () => {
    const source = "(a as u8) << 2 == 'c' as u8";
    expect(colorize(source).replace(/\x1b\[\d+m/g, "")).toBe(source);
  });
});
