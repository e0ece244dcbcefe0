import createDebug from "debug";
import type { LeveledLogger } from "../interfaces/logger.js";
import { LogLevel } from "../interfaces/logger.js";

/** Printf-style sink, the shape of a `debug` instance. */
export type DebugChannel = (formatter: string, ...args: unknown[]) => void;

export interface DebugLoggerOptions {
  /** `debug` namespace; enable output with `DEBUG=<namespace>`. */
  namespace?: string;
  level?: LogLevel;
  channel?: DebugChannel;
}

export const DEFAULT_DEBUG_NAMESPACE = "loghost";

/**
 * Writes to the process debug channel provided by the `debug` package.
 * Filters by its own threshold before touching the channel.
 */
export class DebugLogger implements LeveledLogger {
  level: LogLevel;
  private channel: DebugChannel;

  constructor(options: DebugLoggerOptions = {}) {
    this.level = options.level ?? LogLevel.DEBUG;
    this.channel = options.channel ?? createDebug(options.namespace ?? DEFAULT_DEBUG_NAMESPACE);
  }

  write(message: string, level: LogLevel): void {
    if (level < this.level) return;
    // "%s" keeps printf sequences inside the message literal
    this.channel("%s", message);
  }
}
