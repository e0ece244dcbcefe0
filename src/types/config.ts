import { loggingSettingsSchema } from "../config/config-schema.js";
import { ConfigurationError } from "../errors.js";

/** Process-wide logging settings, read by log managers at lookup time. */
export interface LoggingSettings {
  /** Hand out no-op loggers everywhere */
  suppressLogging: boolean; // default: false
  /** Capacity of a DefaultLogManager cache when none is given */
  bigCacheLimit: number; // default: 256
}

export const DEFAULT_LOGGING_SETTINGS: Readonly<LoggingSettings> = Object.freeze({
  suppressLogging: false,
  bigCacheLimit: 256,
});

/** Validate `overrides` and merge them over `base` (the defaults when omitted). */
export function resolveLoggingSettings(
  overrides: Partial<LoggingSettings>,
  base: Readonly<LoggingSettings> = DEFAULT_LOGGING_SETTINGS,
): LoggingSettings {
  const validation = loggingSettingsSchema.safeParse(overrides);
  if (!validation.success) {
    throw new ConfigurationError(`Invalid logging configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const resolved: LoggingSettings = { ...base };
  const { suppressLogging, bigCacheLimit } = validation.data;
  if (suppressLogging !== undefined) resolved.suppressLogging = suppressLogging;
  if (bigCacheLimit !== undefined) resolved.bigCacheLimit = bigCacheLimit;
  return resolved;
}
