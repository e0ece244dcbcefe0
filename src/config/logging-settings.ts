/**
 * Process-wide logging settings store.
 * Readers may observe a value set concurrently with their lookup either before
 * or after the change; every read returns a complete, frozen snapshot.
 * @module
 */

import { ConfigurationError } from "../errors.js";
import {
  DEFAULT_LOGGING_SETTINGS,
  type LoggingSettings,
  resolveLoggingSettings,
} from "../types/config.js";
import { loggingEnvSchema } from "./config-schema.js";

let current: Readonly<LoggingSettings> = DEFAULT_LOGGING_SETTINGS;

export function getLoggingSettings(): Readonly<LoggingSettings> {
  return current;
}

/**
 * Apply validated overrides on top of the current settings. A new
 * `bigCacheLimit` reaches the process-default manager on its next lookup;
 * managers built with an explicit `maxCacheSize` keep theirs.
 */
export function configureLogging(overrides: Partial<LoggingSettings>): Readonly<LoggingSettings> {
  current = Object.freeze(resolveLoggingSettings(overrides, current));
  return current;
}

export function resetLoggingSettings(): void {
  current = DEFAULT_LOGGING_SETTINGS;
}

/**
 * Read `LOGHOST_SUPPRESS` and `LOGHOST_CACHE_LIMIT` into a settings override.
 * Unset or empty variables are left out.
 */
export function loadLoggingSettingsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Partial<LoggingSettings> {
  const parsed = loggingEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid logging environment: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }

  const overrides: Partial<LoggingSettings> = {};
  if (parsed.data.LOGHOST_SUPPRESS !== undefined) {
    overrides.suppressLogging = parsed.data.LOGHOST_SUPPRESS;
  }
  if (parsed.data.LOGHOST_CACHE_LIMIT !== undefined) {
    overrides.bigCacheLimit = parsed.data.LOGHOST_CACHE_LIMIT;
  }
  return overrides;
}
