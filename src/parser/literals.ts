/**
 * Decoding of literal token text: numbers with radix prefixes, `_`
 * separators and type suffixes; char and string escapes; raw strings.
 */

import { Literal } from "../expr";
import { bigintToFloat } from "../numeric";
import { parseError, unsupported } from "../errors";

const INT_SUFFIX = "[iu](?:8|16|32|64|128|size)";
const FLOAT_SUFFIX = "f(?:32|64)";

const HEX_INT = new RegExp(`^0x([0-9a-fA-F]+)(${INT_SUFFIX})?$`);
const OCTAL_INT = new RegExp(`^0o([0-7]+)(${INT_SUFFIX})?$`);
const BINARY_INT = new RegExp(`^0b([01]+)(${INT_SUFFIX})?$`);
const DECIMAL_INT = new RegExp(`^(\\d+)(${INT_SUFFIX}|${FLOAT_SUFFIX})?$`);
const DECIMAL_FLOAT = new RegExp(`^(\\d+(?:\\.\\d*)?(?:[eE][+-]?\\d+)?)(${FLOAT_SUFFIX})?$`);

// ============================================================================
// Numbers
// ============================================================================

/**
 * Decode an integer or float token.
 *
 * @example
 * parseNumberLiteral("1_000")  // int 1000
 * parseNumberLiteral("0xffu8") // int 255, suffix u8
 * parseNumberLiteral("2f32")   // float 2, suffix f32
 * parseNumberLiteral("1e3")    // float 1000
 */
export function parseNumberLiteral(raw: string): Literal {
  const text = raw.replace(/_/g, "");

  for (const [pattern, prefix] of [
    [HEX_INT, "0x"],
    [OCTAL_INT, "0o"],
    [BINARY_INT, "0b"],
  ] as const) {
    const match = pattern.exec(text);
    if (match) {
      return intLiteral(BigInt(`${prefix}${match[1]}`), match[2]);
    }
  }

  const decimal = DECIMAL_INT.exec(text);
  if (decimal) {
    const [, digits, suffix] = decimal;
    if (suffix === "f32" || suffix === "f64") {
      return { tag: "float", value: bigintToFloat(BigInt(digits), suffix), suffix };
    }
    return intLiteral(BigInt(digits), suffix);
  }

  const float = DECIMAL_FLOAT.exec(text);
  if (float) {
    const [, digits, suffix] = float;
    return suffix === undefined
      ? { tag: "float", value: Number(digits) }
      : { tag: "float", value: Number(digits), suffix };
  }

  throw parseError(`invalid number literal: ${raw}`);
}

// Range is checked at evaluation, after a leading minus sign is folded in
function intLiteral(value: bigint, suffix: string | undefined): Literal {
  return suffix === undefined ? { tag: "int", value } : { tag: "int", value, suffix };
}

// ============================================================================
// Characters and Strings
// ============================================================================

export function parseCharLiteral(raw: string): Literal {
  if (raw.startsWith("b")) {
    throw unsupported("byte literals");
  }
  if (raw.length < 3 || !raw.startsWith("'") || !raw.endsWith("'")) {
    throw parseError(`invalid character literal: ${raw}`);
  }

  const value = unescape(raw.slice(1, -1));
  if ([...value].length !== 1) {
    throw parseError(`character literal may only contain one codepoint: ${raw}`);
  }
  return { tag: "char", value };
}

export function parseStringLiteral(raw: string): Literal {
  if (raw.startsWith("b")) {
    throw unsupported("byte literals");
  }
  if (raw.startsWith("c")) {
    throw unsupported("C string literals");
  }

  const rawString = /^r(#*)"([\s\S]*)"\1$/.exec(raw);
  if (rawString) {
    return { tag: "string", value: rawString[2] };
  }

  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) {
    throw parseError(`invalid string literal: ${raw}`);
  }
  return { tag: "string", value: unescape(raw.slice(1, -1)) };
}

/**
 * Resolve backslash escapes in the body of a char or string literal.
 */
export function unescape(body: string): string {
  let out = "";
  for (let i = 0; i < body.length; i++) {
    const c = body[i];
    if (c !== "\\") {
      out += c;
      continue;
    }

    i++;
    const next = body.charAt(i);
    switch (next) {
      case "n":
        out += "\n";
        break;
      case "r":
        out += "\r";
        break;
      case "t":
        out += "\t";
        break;
      case "0":
        out += "\0";
        break;
      case "\\":
      case "'":
      case '"':
        out += next;
        break;
      case "x": {
        const hex = body.slice(i + 1, i + 3);
        if (!/^[0-7][0-9a-fA-F]$/.test(hex)) {
          throw parseError(`invalid \\x escape: \\x${hex}`);
        }
        out += String.fromCharCode(parseInt(hex, 16));
        i += 2;
        break;
      }
      case "u": {
        const match = /^\{([0-9a-fA-F_]{1,8})\}/.exec(body.slice(i + 1));
        if (!match) {
          throw parseError("invalid unicode escape");
        }
        const codePoint = parseInt(match[1].replace(/_/g, ""), 16);
        if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
          throw parseError(`invalid unicode character escape: \\u${match[0]}`);
        }
        out += String.fromCodePoint(codePoint);
        i += match[0].length;
        break;
      }
      case "\n":
        // Line continuation: skip the newline and leading whitespace
        while (i + 1 < body.length && /\s/.test(body.charAt(i + 1))) i++;
        break;
      default:
        throw parseError(
          next === "" ? "unterminated escape sequence" : `unknown character escape: \\${next}`
        );
    }
  }
  return out;
}
