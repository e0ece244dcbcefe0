/**
 * Ambient access to owner loggers.
 *
 * `logFor(this)` returns the logger for the caller's class through the
 * process-wide log manager. The process-wide resolver is opt-in: code that
 * wants explicit wiring builds a DefaultLogManager itself and never touches
 * this module.
 * @module
 */

import { getLoggingSettings } from "../config/logging-settings.js";
import type { LogManager, LogOwner } from "../interfaces/log-manager.js";
import type { FullLogger } from "../interfaces/logger.js";
import type { ServiceResolver } from "../interfaces/service-resolver.js";
import { DefaultLogManager, NULL_FULL_LOGGER } from "./log-manager.js";
import { LOG_MANAGER } from "./service-token.js";

let ambientResolver: ServiceResolver | undefined;
let defaultManager: LogManager | undefined;
let defaultManagerLimit: number | undefined;

function isOwnerClass(value: unknown): value is abstract new (...args: never[]) => unknown {
  return typeof value === "function";
}

/** Classes key by themselves, instances by their constructor, strings by name. */
function ownerOf(subject: string | object): LogOwner {
  if (typeof subject === "string" || isOwnerClass(subject)) return subject;
  const ctor: unknown = subject.constructor;
  return isOwnerClass(ctor) ? ctor : "Object";
}

function currentManager(): LogManager {
  const configured = ambientResolver?.getService(LOG_MANAGER);
  if (configured) return configured;
  const { bigCacheLimit } = getLoggingSettings();
  if (!defaultManager || defaultManagerLimit !== bigCacheLimit) {
    defaultManager = new DefaultLogManager({
      resolver: ambientResolver,
      maxCacheSize: bigCacheLimit,
    });
    defaultManagerLimit = bigCacheLimit;
  }
  return defaultManager;
}

/** Logger for `subject`: an owner name, a class, or an instance of the owning class. */
export function logFor(subject: string | object): FullLogger {
  if (getLoggingSettings().suppressLogging) return NULL_FULL_LOGGER;
  return currentManager().getLogger(ownerOf(subject));
}

export class LogHost {
  private constructor() {}

  /** Logger for free functions and module-level code, prefixed `"LogHost: "`. */
  static get default(): FullLogger {
    return logFor(LogHost);
  }

  /**
   * Install the process-wide resolver. It supplies the LeveledLogger backend
   * and may override the log manager itself; the default manager is rebuilt
   * on next use, as it is after `bigCacheLimit` changes.
   */
  static useResolver(resolver: ServiceResolver | undefined): void {
    ambientResolver = resolver;
    defaultManager = undefined;
  }

  static reset(): void {
    LogHost.useResolver(undefined);
  }
}

/** Base class for types that log on their own behalf. */
export class Loggable {
  log(): FullLogger {
    return logFor(this);
  }
}

// biome-ignore lint/suspicious/noExplicitAny: mixin constructors must take any[]
export type Constructor<T = object> = new (...args: any[]) => T;

/** Mixin adding `log()` to an existing class hierarchy. */
export function withLogging<TBase extends Constructor>(Base: TBase) {
  return class extends Base {
    log(): FullLogger {
      return logFor(this);
    }
  };
}
