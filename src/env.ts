/**
 * Environment - maps variable names to values.
 * Immutable: set() returns a new Env.
 */

import { Value } from "./value";

export class Env {
  private readonly bindings: ReadonlyMap<string, Value>;

  constructor(initial?: ReadonlyMap<string, Value>) {
    this.bindings = initial ?? new Map();
  }

  static empty(): Env {
    return new Env();
  }

  static fromRecord(record: Record<string, Value>): Env {
    return Env.fromEntries(Object.entries(record));
  }

  static fromEntries(entries: Iterable<readonly [string, Value]>): Env {
    const bindings = new Map<string, Value>();
    for (const [name, value] of entries) {
      bindings.set(name, value);
    }
    return new Env(bindings);
  }

  /**
   * Look up a value by name; undefined when unbound.
   */
  get(name: string): Value | undefined {
    return this.bindings.get(name);
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  /**
   * Create a new environment with an additional binding.
   * Does not mutate the current environment.
   */
  set(name: string, value: Value): Env {
    const newBindings = new Map(this.bindings);
    newBindings.set(name, value);
    return new Env(newBindings);
  }

  /**
   * Create a new environment without the given name.
   */
  delete(name: string): Env {
    const newBindings = new Map(this.bindings);
    newBindings.delete(name);
    return new Env(newBindings);
  }

  entries(): IterableIterator<[string, Value]> {
    return this.bindings.entries();
  }

  get size(): number {
    return this.bindings.size;
  }
}
