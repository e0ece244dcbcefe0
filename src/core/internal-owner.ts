import type { LogOwner } from "../interfaces/log-manager.js";

/**
 * Static marker carried by the classes that make up the logger cache.
 * Log managers hand out a no-op logger for them so the cache never logs about itself.
 */
export const INTERNAL_OWNER: unique symbol = Symbol("loghost.internalOwner");

export function isInternalOwner(owner: LogOwner): boolean {
  return typeof owner === "function" && Object.hasOwn(owner, INTERNAL_OWNER);
}
