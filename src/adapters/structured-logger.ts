import type { LeveledLogger } from "../interfaces/logger.js";
import { LogLevel } from "../interfaces/logger.js";

export const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
  [LogLevel.FATAL]: "fatal",
};

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
  now?: () => Date;
}

/** Emits one JSON object per line: `{ time, level, msg, component? }`. */
export class StructuredLogger implements LeveledLogger {
  level: LogLevel;
  private writer: (line: string) => void;
  private component: string | undefined;
  private now: () => Date;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.DEBUG;
    this.component = options.component;
    this.now = options.now ?? (() => new Date());
  }

  write(message: string, level: LogLevel): void {
    if (level < this.level) return;

    const entry: Record<string, string> = {
      time: this.now().toISOString(),
      level: LEVEL_NAMES[level],
      msg: message,
    };
    if (this.component) entry.component = this.component;

    this.writer(JSON.stringify(entry));
  }
}
