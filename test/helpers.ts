import { EvalError } from "../src/errors";

/**
 * Run `fn` and return the EvalError it throws.
 */
export function evalErrorOf(fn: () => unknown): EvalError {
  try {
    fn();
  } catch (e) {
    if (e instanceof EvalError) return e;
    throw e;
  }
  throw new Error("expected an EvalError to be thrown");
}
