/**
 * Generic registry for pluggable implementations.
 *
 * Append-only: a name, once registered, keeps its factory for the life of
 * the process.
 */
import { ConfigError } from "./errors.js";

export type Factory<T, Args extends unknown[]> = (...args: Args) => T;

export interface RegistryOptions {
  /** Builds the error thrown for an unregistered name. */
  readonly missing?: (name: string, available: readonly string[]) => Error;
}

export class Registry<T, Args extends unknown[] = []> {
  private readonly _map = new Map<string, Factory<T, Args>>();
  private readonly _missing?: (name: string, available: readonly string[]) => Error;
  readonly subsystem: string;

  constructor(subsystem: string, opts: RegistryOptions = {}) {
    this.subsystem = subsystem;
    this._missing = opts.missing;
  }

  register(name: string, factory: Factory<T, Args>): void {
    if (this._map.has(name)) {
      throw new ConfigError({
        message: `[${this.subsystem}] "${name}" is already registered`,
      });
    }
    this._map.set(name, factory);
  }

  get(name: string, ...args: Args): T {
    const factory = this._map.get(name);
    if (!factory) {
      const avail = this.list();
      if (this._missing) throw this._missing(name, avail);
      throw new ConfigError({
        message: `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail.join(", ")}`,
      });
    }
    return factory(...args);
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
