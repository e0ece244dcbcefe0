import type { LeveledLogger } from "../interfaces/logger.js";
import { LogLevel } from "../interfaces/logger.js";

export interface LogRecord {
  message: string;
  level: LogLevel;
}

/**
 * Recording LeveledLogger for tests and diagnostics.
 * Writes below `level` are dropped like any other backend.
 */
export class MemoryLogger implements LeveledLogger {
  readonly records: LogRecord[] = [];

  constructor(public level: LogLevel = LogLevel.DEBUG) {}

  write(message: string, level: LogLevel): void {
    if (level < this.level) return;
    this.records.push({ message, level });
  }

  /** Recorded messages, oldest first. */
  messages(): string[] {
    return this.records.map((r) => r.message);
  }

  clear(): void {
    this.records.length = 0;
  }
}
