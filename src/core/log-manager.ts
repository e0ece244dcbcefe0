import { NullLogger } from "../adapters/null-logger.js";
import { getLoggingSettings } from "../config/logging-settings.js";
import type { LogManager, LogOwner } from "../interfaces/log-manager.js";
import type { FullLogger, LeveledLogger } from "../interfaces/logger.js";
import type { ServiceResolver } from "../interfaces/service-resolver.js";
import { INTERNAL_OWNER, isInternalOwner } from "./internal-owner.js";
import { MemoizingMRUCache } from "./memoizing-mru-cache.js";
import { PrefixingLogger } from "./prefixing-logger.js";
import { LEVELED_LOGGER } from "./service-token.js";

export type { LogManager, LogOwner } from "../interfaces/log-manager.js";

/** Shared logger that drops everything; handed out when logging is suppressed. */
export const NULL_FULL_LOGGER: FullLogger = new PrefixingLogger(new NullLogger(), "NullLogger");

/** Name used in the prefix of loggers created for `owner`. */
export function ownerName(owner: LogOwner): string {
  if (typeof owner === "string") return owner;
  return owner.name || "Anonymous";
}

export interface DefaultLogManagerOptions {
  /** Source of the configured backend; without one every logger uses `fallbackLogger`. */
  resolver?: ServiceResolver;
  /** Backend used when the resolver has none registered. Default: a NullLogger. */
  fallbackLogger?: LeveledLogger;
  /** Cache capacity. Default: `bigCacheLimit` from the process settings at construction. */
  maxCacheSize?: number;
  /** Checked on every lookup. Default: `suppressLogging` from the process settings. */
  isSuppressed?: () => boolean;
}

/**
 * Resolves a backend once per owner and caches the owner's prefixed logger.
 *
 * Lookups are synchronous, so each `getLogger` call runs as one critical
 * section over the whole cache. A lookup issued while a logger is being
 * built (a resolver that logs, say) gets the no-op logger instead of
 * recursing into the cache.
 */
export class DefaultLogManager implements LogManager {
  static readonly [INTERNAL_OWNER] = true;

  private readonly cache: MemoizingMRUCache<LogOwner, FullLogger>;
  private readonly resolver: ServiceResolver | undefined;
  private readonly fallbackLogger: LeveledLogger;
  private readonly isSuppressed: () => boolean;
  private creating = false;

  constructor(options: DefaultLogManagerOptions = {}) {
    this.resolver = options.resolver;
    this.fallbackLogger = options.fallbackLogger ?? new NullLogger();
    this.isSuppressed = options.isSuppressed ?? (() => getLoggingSettings().suppressLogging);
    this.cache = new MemoizingMRUCache<LogOwner, FullLogger>(
      (owner) => this.createLogger(owner),
      options.maxCacheSize ?? getLoggingSettings().bigCacheLimit,
    );
  }

  getLogger(owner: LogOwner): FullLogger {
    if (this.isSuppressed()) return NULL_FULL_LOGGER;
    if (isInternalOwner(owner)) return NULL_FULL_LOGGER;
    if (this.creating) return NULL_FULL_LOGGER;
    return this.cache.get(owner);
  }

  private createLogger(owner: LogOwner): FullLogger {
    this.creating = true;
    try {
      const backend = this.resolver?.getService(LEVELED_LOGGER) ?? this.fallbackLogger;
      return new PrefixingLogger(backend, ownerName(owner));
    } finally {
      this.creating = false;
    }
  }
}

/** Delegates every lookup to a function. No caching, no suppression check. */
export class FuncLogManager implements LogManager {
  constructor(private readonly getLoggerFn: (owner: LogOwner) => FullLogger) {}

  getLogger(owner: LogOwner): FullLogger {
    return this.getLoggerFn(owner);
  }
}
