/**
 * Console-based LeveledLogger.
 * Optionally tags every line with `[tag] ` and drops writes below `level`.
 */

import type { LeveledLogger } from "../interfaces/logger.js";
import { LogLevel } from "../interfaces/logger.js";

type ConsoleMethod = "debug" | "log" | "warn" | "error";

const CONSOLE_METHODS: Record<LogLevel, ConsoleMethod> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "log",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
  [LogLevel.FATAL]: "error",
};

export interface ConsoleLoggerOptions {
  tag?: string;
  level?: LogLevel;
}

export class ConsoleLogger implements LeveledLogger {
  level: LogLevel;
  private tag: string | undefined;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.tag = options.tag;
    this.level = options.level ?? LogLevel.DEBUG;
  }

  write(message: string, level: LogLevel): void {
    if (level < this.level) return;
    const formatted = this.tag ? `[${this.tag}] ${message}` : message;
    console[CONSOLE_METHODS[level]](formatted);
  }
}
