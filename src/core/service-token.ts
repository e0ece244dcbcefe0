import type { LogManager } from "../interfaces/log-manager.js";
import type { LeveledLogger } from "../interfaces/logger.js";

/**
 * Typed key naming a service capability.
 * Registrations are stored on the token, one slot per registry, so a lookup
 * hands back a factory of exactly the token's type.
 */
export class ServiceToken<T> {
  private readonly registrations = new WeakMap<object, () => T>();

  constructor(readonly name: string) {}

  /** @internal Used by registries; `scope` is the registry instance. */
  bind(scope: object, factory: () => T): void {
    this.registrations.set(scope, factory);
  }

  /** @internal */
  lookup(scope: object): (() => T) | undefined {
    return this.registrations.get(scope);
  }

  toString(): string {
    return `ServiceToken(${this.name})`;
  }
}

/** Backend every newly created owner logger writes through. */
export const LEVELED_LOGGER = new ServiceToken<LeveledLogger>("LeveledLogger");

/** Overrides the process-default log manager used by the ambient accessor. */
export const LOG_MANAGER = new ServiceToken<LogManager>("LogManager");
