/**
 * Text in, typed result out: parse, convert and evaluate one expression.
 */

import { Value, typeName, valueToString } from "./value";
import { Env } from "./env";
import { evaluate } from "./evaluate";
import { parseExpression } from "./parser";
import { EvalError } from "./errors";

export type EvalOutcome =
  | { ok: true; value: Value; typeName: string; display: string }
  | { ok: false; error: EvalError };

/**
 * Evaluate `source` against `env`. Evaluation errors are returned as a
 * failed outcome; any other exception is a bug and propagates.
 *
 * @example
 * evaluateSource("x + 1", Env.fromRecord({ x: intVal("i32", 41) }))
 * // { ok: true, value: i32 42, typeName: "i32", display: "42" }
 */
export function evaluateSource(source: string, env: Env = Env.empty()): EvalOutcome {
  try {
    const value = evaluate(parseExpression(source), env);
    return { ok: true, value, typeName: typeName(value), display: valueToString(value) };
  } catch (e) {
    if (e instanceof EvalError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}

/**
 * `<display>: <type>` on success, the one-line error message otherwise.
 */
export function formatOutcome(outcome: EvalOutcome): string {
  return outcome.ok ? `${outcome.display}: ${outcome.typeName}` : outcome.error.message;
}
