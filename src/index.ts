/**
 * loghost public API barrel.
 *
 * Re-exports the logging contracts, log managers, ambient accessor, RxJS
 * operators, backends, settings and errors that make up the public surface
 * area of the `loghost` package.
 * @module
 */

// Backends
export type { ConsoleLoggerOptions } from "./adapters/console-logger.js";
export { ConsoleLogger } from "./adapters/console-logger.js";
export type { DebugChannel, DebugLoggerOptions } from "./adapters/debug-logger.js";
export { DEFAULT_DEBUG_NAMESPACE, DebugLogger } from "./adapters/debug-logger.js";
export { NullLogger } from "./adapters/null-logger.js";
export { ServiceRegistry } from "./adapters/service-registry.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LEVEL_NAMES, StructuredLogger } from "./adapters/structured-logger.js";
// Settings
export { loggingSettingsSchema } from "./config/config-schema.js";
export {
  configureLogging,
  getLoggingSettings,
  loadLoggingSettingsFromEnv,
  resetLoggingSettings,
} from "./config/logging-settings.js";
// Core
export { defaultText, errorText, FormatProvider, formatTemplate } from "./core/format.js";
export { INTERNAL_OWNER } from "./core/internal-owner.js";
export { Loggable, LogHost, logFor, withLogging } from "./core/log-host.js";
export type { DefaultLogManagerOptions } from "./core/log-manager.js";
export {
  DefaultLogManager,
  FuncLogManager,
  NULL_FULL_LOGGER,
  ownerName,
} from "./core/log-manager.js";
export { MemoizingMRUCache } from "./core/memoizing-mru-cache.js";
export { logged, loggedCatch, loggedCatchOf } from "./core/observable-logging.js";
export { PrefixingLogger, renderLogArgs } from "./core/prefixing-logger.js";
export { LEVELED_LOGGER, LOG_MANAGER, ServiceToken } from "./core/service-token.js";
export { ConfigurationError, FormatError, LoggingError } from "./errors.js";
// Contracts
export type { LogManager, LogOwner } from "./interfaces/log-manager.js";
export type { FullLogger, LeveledLogger, LogArgs } from "./interfaces/logger.js";
export { LogLevel } from "./interfaces/logger.js";
export type { ServiceResolver } from "./interfaces/service-resolver.js";
export type { LoggingSettings } from "./types/config.js";
export { DEFAULT_LOGGING_SETTINGS, resolveLoggingSettings } from "./types/config.js";
