/**
 * Leveled logging contracts.
 * Backends (NullLogger, DebugLogger, ConsoleLogger, StructuredLogger) implement
 * LeveledLogger; application code programs to FullLogger.
 * @module
 */

import type { FormatProvider } from "../core/format.js";

export enum LogLevel {
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
}

/** Minimal backend contract: write a message at a level, with a mutable threshold. */
export interface LeveledLogger {
  write(message: string, level: LogLevel): void;
  level: LogLevel;
}

/**
 * Argument shapes accepted by every per-level method of {@link FullLogger}.
 *
 * - `(value)`: the value's default text; a lone string is written literally
 * - `(message, ...args)`: composite template, invariant formatting
 * - `(provider, value)` / `(provider, message, ...args)`: explicit provider
 */
export type LogArgs =
  | [value: unknown]
  | [message: string, ...args: unknown[]]
  | [provider: FormatProvider, value: unknown]
  | [provider: FormatProvider, message: string, ...args: unknown[]];

export interface FullLogger extends LeveledLogger {
  debug(...args: LogArgs): void;
  debugException(message: string, error: unknown): void;

  info(...args: LogArgs): void;
  infoException(message: string, error: unknown): void;

  warn(...args: LogArgs): void;
  warnException(message: string, error: unknown): void;

  error(...args: LogArgs): void;
  errorException(message: string, error: unknown): void;

  fatal(...args: LogArgs): void;
  fatalException(message: string, error: unknown): void;
}
