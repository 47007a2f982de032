/**
 * Token classification for terminal display, using the highlight tags
 * @lezer/rust attaches to its grammar.
 */

import { highlightTree, classHighlighter } from "@lezer/highlight";
import { parseTree } from "./index";

export interface HighlightSpan {
  from: number;
  to: number;
  /** e.g. "tok-number", "tok-operator" */
  className: string;
}

/**
 * Classified spans of `source`, in document order. Unstyled text
 * (whitespace, unknown tokens) has no span.
 */
export function highlightSpans(source: string): HighlightSpan[] {
  const spans: HighlightSpan[] = [];
  highlightTree(parseTree(source), classHighlighter, (from, to, classes) => {
    // Spans past the input belong to the statement terminator parseTree adds
    if (from < source.length) {
      spans.push({ from, to: Math.min(to, source.length), className: classes.split(" ")[0] });
    }
  });
  return spans;
}

const ANSI_RESET = "\x1b[0m";

const ANSI_COLORS: Record<string, string> = {
  "tok-number": "\x1b[33m",
  "tok-string": "\x1b[32m",
  "tok-string2": "\x1b[32m",
  "tok-bool": "\x1b[35m",
  "tok-keyword": "\x1b[35m",
  "tok-operator": "\x1b[36m",
  "tok-variableName": "\x1b[34m",
  "tok-typeName": "\x1b[96m",
  "tok-comment": "\x1b[90m",
};

/**
 * Wrap each classified span in ANSI color codes.
 */
export function colorize(source: string): string {
  let out = "";
  let pos = 0;
  for (const span of highlightSpans(source)) {
    const color = ANSI_COLORS[span.className];
    if (color === undefined) continue;
    out += source.slice(pos, span.from) + color + source.slice(span.from, span.to) + ANSI_RESET;
    pos = span.to;
  }
  return out + source.slice(pos);
}
