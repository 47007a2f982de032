/**
 * Variable bindings supplied as text, e.g. from a debugger's variable view
 * or the command line: `{ name: "x", typeName: "i32", value: "42" }`.
 */

import { Value, intVal, floatVal, boolVal, charVal, stringVal } from "./value";
import { isIntTypeName, isFloatTypeName, fitsIn } from "./numeric";
import { Env } from "./env";
import { unescape } from "./parser/literals";
import { EvalError } from "./errors";

export interface VariableBinding {
  name: string;
  typeName: string;
  value: string;
}

const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const FLOAT_SPECIALS = new Map<string, number>([
  ["inf", Infinity],
  ["+inf", Infinity],
  ["-inf", -Infinity],
  ["NaN", NaN],
]);

/**
 * Decode `text` as a value of the named primitive type.
 * Returns undefined when the type is not a primitive or the text does not
 * denote a value of it.
 *
 * @example
 * parseValue("u8", "255")     // u8 255
 * parseValue("u8", "256")     // undefined
 * parseValue("char", "'x'")   // char 'x'
 * parseValue("char", "'\\n'")  // char '\n'
 * parseValue("Vec<i32>", "")  // undefined
 */
export function parseValue(typeName: string, text: string): Value | undefined {
  const type = typeName.replace(/\s+/g, "");
  const trimmed = text.trim();

  if (isIntTypeName(type)) {
    if (!INTEGER.test(trimmed)) return undefined;
    const wide = BigInt(trimmed);
    return fitsIn(wide, type) ? intVal(type, wide) : undefined;
  }

  if (isFloatTypeName(type)) {
    const special = FLOAT_SPECIALS.get(trimmed);
    if (special !== undefined) return floatVal(type, special);
    return FLOAT.test(trimmed) ? floatVal(type, Number(trimmed)) : undefined;
  }

  switch (type) {
    case "bool":
      if (trimmed === "true") return boolVal(true);
      if (trimmed === "false") return boolVal(false);
      return undefined;

    case "char": {
      const quoted = /^'([\s\S]+)'$/.exec(trimmed);
      const body = quoted ? unescapeOrUndefined(quoted[1]) : trimmed;
      return body !== undefined && [...body].length === 1 ? charVal(body) : undefined;
    }

    case "String":
    case "&str": {
      const quoted = /^"([\s\S]*)"$/.exec(trimmed);
      return stringVal(quoted ? quoted[1] : trimmed);
    }

    default:
      return undefined;
  }
}

function unescapeOrUndefined(body: string): string | undefined {
  try {
    return unescape(body);
  } catch (error) {
    if (error instanceof EvalError) return undefined;
    throw error;
  }
}

/**
 * Build an environment from text bindings. A binding whose text does not
 * parse for its type is left out; a later binding of a name replaces an
 * earlier one.
 */
export function envFromBindings(bindings: readonly VariableBinding[]): Env {
  let env = Env.empty();
  for (const binding of bindings) {
    const value = parseValue(binding.typeName, binding.value);
    if (value !== undefined) {
      env = env.set(binding.name, value);
    }
  }
  return env;
}
