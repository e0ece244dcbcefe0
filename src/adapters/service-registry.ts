import type { ServiceToken } from "../core/service-token.js";
import type { ServiceResolver } from "../interfaces/service-resolver.js";

export type { ServiceResolver } from "../interfaces/service-resolver.js";

/**
 * In-process service registry.
 * A later registration for the same token replaces the earlier one.
 */
export class ServiceRegistry implements ServiceResolver {
  /** Register a factory invoked on every lookup. */
  register<T>(token: ServiceToken<T>, factory: () => T): this {
    token.bind(this, factory);
    return this;
  }

  registerConstant<T>(token: ServiceToken<T>, value: T): this {
    token.bind(this, () => value);
    return this;
  }

  getService<T>(token: ServiceToken<T>): T | null {
    const factory = token.lookup(this);
    return factory ? factory() : null;
  }
}
