/**
 * Command-line evaluation of a single Rust expression.
 *
 * Usage:
 *   rsexpr [options] <expression>
 *   rsexpr --help
 *
 * Options:
 *   -v, --var <name>:<type>=<value>   Bind a variable (repeatable)
 *   --ast                             Print the parsed expression instead of evaluating
 *   --json                            Print the result as JSON
 *   -h, --help                        Show help
 */

import { parseValue } from "./bindings";
import { Env } from "./env";
import { Value } from "./value";
import { EvalError } from "./errors";
import { exprToString } from "./expr";
import { parseExpression } from "./parser";
import { evaluateSource, formatOutcome } from "./run";

export interface CliOptions {
  expression: string;
  env: Env;
  ast: boolean;
  json: boolean;
}

/** Where the CLI writes its lines. */
export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export const EXIT_OK = 0;
export const EXIT_EVAL_ERROR = 1;
export const EXIT_USAGE = 2;

const consoleOutput: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export const HELP_TEXT = `
rsexpr - evaluate a Rust expression

Usage:
  rsexpr [options] <expression>

Options:
  -v, --var <name>:<type>=<value>   Bind a variable (repeatable)
  --ast                             Print the parsed expression instead of evaluating
  --json                            Print the result as JSON
  -h, --help                        Show this help

Examples:
  rsexpr "1 + 2"
  rsexpr -v x:u8=250 "x + 5u8"
  rsexpr --ast "a * (b + 1) as i64"
  rsexpr -- "-5i8 as u8"
`;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const VAR_SPEC = /^([A-Za-z_][A-Za-z0-9_]*)\s*:\s*([^=]+?)\s*=([\s\S]*)$/;

/**
 * Parse `name:type=value` into a binding.
 */
export function parseVarOption(spec: string): [string, Value] {
  const match = VAR_SPEC.exec(spec);
  if (!match) {
    throw new UsageError(`Invalid --var '${spec}', expected <name>:<type>=<value>`);
  }
  const [, name, typeName, text] = match;
  const value = parseValue(typeName, text);
  if (value === undefined) {
    throw new UsageError(`Cannot parse '${text}' as ${typeName} for variable '${name}'`);
  }
  return [name, value];
}

/**
 * Parse command-line arguments. Returns "help" when help was requested.
 */
export function parseArgs(args: readonly string[]): CliOptions | "help" {
  let expression: string | undefined;
  let env = Env.empty();
  let ast = false;
  let json = false;
  let positionalOnly = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    // `-5` and friends are expressions, not options
    const isOption = !positionalOnly && arg.startsWith("-") && !/^-[\d.(]/.test(arg);

    if (!isOption) {
      if (expression !== undefined) {
        throw new UsageError("Multiple expressions given; quote the expression");
      }
      expression = arg;
    } else if (arg === "--") {
      positionalOnly = true;
    } else if (arg === "-h" || arg === "--help") {
      return "help";
    } else if (arg === "-v" || arg === "--var") {
      i++;
      if (i >= args.length) {
        throw new UsageError(`${arg} requires <name>:<type>=<value>`);
      }
      const [name, value] = parseVarOption(args[i]);
      env = env.set(name, value);
    } else if (arg === "--ast") {
      ast = true;
    } else if (arg === "--json") {
      json = true;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (expression === undefined) {
    throw new UsageError("No expression specified");
  }

  return { expression, env, ast, json };
}

/**
 * Run the CLI and return its exit code.
 */
export function runCli(args: readonly string[], output: CliOutput = consoleOutput): number {
  let options: CliOptions | "help";
  try {
    options = parseArgs(args);
  } catch (e) {
    if (e instanceof UsageError) {
      output.error(`Error: ${e.message}`);
      output.error("Run 'rsexpr --help' for usage.");
      return EXIT_USAGE;
    }
    throw e;
  }

  if (options === "help") {
    output.log(HELP_TEXT);
    return EXIT_OK;
  }

  if (options.ast) {
    return printAst(options, output);
  }

  const outcome = evaluateSource(options.expression, options.env);
  if (options.json) {
    output.log(
      JSON.stringify(
        outcome.ok
          ? { value: outcome.display, type: outcome.typeName }
          : { error: outcome.error.message }
      )
    );
    return outcome.ok ? EXIT_OK : EXIT_EVAL_ERROR;
  }

  if (!outcome.ok) {
    output.error(formatOutcome(outcome));
    return EXIT_EVAL_ERROR;
  }
  output.log(formatOutcome(outcome));
  return EXIT_OK;
}

function printAst(options: CliOptions, output: CliOutput): number {
  try {
    const text = exprToString(parseExpression(options.expression));
    output.log(options.json ? JSON.stringify({ ast: text }) : text);
    return EXIT_OK;
  } catch (e) {
    if (!(e instanceof EvalError)) throw e;
    if (options.json) {
      output.log(JSON.stringify({ error: e.message }));
    } else {
      output.error(e.message);
    }
    return EXIT_EVAL_ERROR;
  }
}
