/**
 * REPL - Read-Eval-Print Loop for Rust expressions over a persistent set
 * of variables.
 */

import * as readline from "readline";
import { Env } from "./env";
import { EvalError } from "./errors";
import { exprToString } from "./expr";
import { parseValue } from "./bindings";
import { parseExpression } from "./parser";
import { colorize } from "./parser/highlight";
import { evaluateSource, formatOutcome } from "./run";
import { typeName, valueToString } from "./value";

// ============================================================================
// Commands
// ============================================================================

interface Command {
  description: string;
  usage?: string;
  handler: (session: ReplSession, args: string) => void;
}

const LET_SPEC = /^([A-Za-z_][A-Za-z0-9_]*)\s*:\s*([^=]+?)\s*=([\s\S]*)$/;

const COMMANDS: Record<string, Command> = {
  help: {
    description: "Show this help message",
    handler: (session) => session.showHelp(),
  },
  let: {
    description: "Bind a variable",
    usage: "<name>: <type> = <value>",
    handler: (session, args) => {
      const match = LET_SPEC.exec(args.trim());
      if (!match) {
        session.print("error: expected :let <name>: <type> = <value>");
        return;
      }
      const [, name, type, text] = match;
      const value = parseValue(type, text);
      if (value === undefined) {
        session.print(`error: cannot parse '${text.trim()}' as ${type}`);
        return;
      }
      session.env = session.env.set(name, value);
      session.print(`${name}: ${typeName(value)} = ${valueToString(value)}`);
    },
  },
  unset: {
    description: "Remove a variable",
    usage: "<name>",
    handler: (session, args) => {
      const name = args.trim();
      if (!session.env.has(name)) {
        session.print(`error: no variable named '${name}'`);
        return;
      }
      session.env = session.env.delete(name);
      session.print(`unset ${name}`);
    },
  },
  vars: {
    description: "List variables",
    handler: (session) => {
      const entries = [...session.env.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      if (entries.length === 0) {
        session.print("(no variables)");
      }
      for (const [name, value] of entries) {
        session.print(`${name}: ${typeName(value)} = ${valueToString(value)}`);
      }
    },
  },
  ast: {
    description: "Show the parsed expression",
    usage: "<expr>",
    handler: (session, args) => {
      try {
        session.print(exprToString(parseExpression(args)));
      } catch (e) {
        if (!(e instanceof EvalError)) throw e;
        session.print(`error: ${e.message}`);
      }
    },
  },
  tokens: {
    description: "Echo an expression with syntax colouring",
    usage: "<expr>",
    handler: (session, args) => session.print(colorize(args.trim())),
  },
  clear: {
    description: "Remove all variables",
    handler: (session) => {
      session.env = Env.empty();
      session.print("cleared all variables");
    },
  },
  exit: {
    description: "Exit the REPL",
    handler: (session) => {
      session.finished = true;
    },
  },
};

// ============================================================================
// Session
// ============================================================================

/**
 * REPL state and line handling, independent of the terminal.
 */
export class ReplSession {
  env: Env;
  finished = false;

  constructor(
    private readonly output: (line: string) => void = (line) => console.log(line),
    env: Env = Env.empty()
  ) {
    this.env = env;
  }

  print(line: string): void {
    this.output(line);
  }

  /**
   * Process one line of input. Returns false once the session has ended.
   */
  handle(input: string): boolean {
    const trimmed = input.trim();

    // Empty input
    if (!trimmed) return !this.finished;

    // Command
    if (trimmed.startsWith(":")) {
      const spaceIdx = trimmed.indexOf(" ");
      const cmdName = spaceIdx > 0 ? trimmed.slice(1, spaceIdx) : trimmed.slice(1);
      const cmdArgs = spaceIdx > 0 ? trimmed.slice(spaceIdx + 1) : "";

      const cmd = Object.prototype.hasOwnProperty.call(COMMANDS, cmdName)
        ? COMMANDS[cmdName]
        : undefined;
      if (cmd) {
        cmd.handler(this, cmdArgs);
      } else {
        this.print(`Unknown command: :${cmdName}. Type :help for available commands.`);
      }
      return !this.finished;
    }

    // Expression
    const outcome = evaluateSource(trimmed, this.env);
    this.print(outcome.ok ? formatOutcome(outcome) : `error: ${outcome.error.message}`);
    return !this.finished;
  }

  showHelp(): void {
    this.print("Commands:");
    for (const [name, { description, usage }] of Object.entries(COMMANDS)) {
      const signature = usage === undefined ? `:${name}` : `:${name} ${usage}`;
      this.print(`  ${signature.padEnd(32)} ${description}`);
    }
    this.print("");
    this.print("Examples:");
    this.print("  :let x: u8 = 250");
    this.print("  x + 5u8");
    this.print("  (x as i32) * -1");
    this.print("  0xff_u8 as i8 == -1i8");
  }
}

// ============================================================================
// Main
// ============================================================================

export function startRepl(): void {
  console.log("rsexpr - Rust expression evaluator");
  console.log("Type :help for available commands, :exit to quit\n");

  const session = new ReplSession();
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "rsexpr> ",
  });

  rl.prompt();

  rl.on("line", (line: string) => {
    if (session.handle(line)) {
      rl.prompt();
    } else {
      rl.close();
    }
  });

  rl.on("close", () => {
    console.log("\nGoodbye!");
  });
}
