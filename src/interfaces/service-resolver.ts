import type { ServiceToken } from "../core/service-token.js";

/** Looks up a registered service, or returns null when none is registered. */
export interface ServiceResolver {
  getService<T>(token: ServiceToken<T>): T | null;
}
