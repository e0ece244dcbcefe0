import type { LeveledLogger } from "../interfaces/logger.js";
import { LogLevel } from "../interfaces/logger.js";

export class NullLogger implements LeveledLogger {
  level: LogLevel = LogLevel.DEBUG;

  write(): void {}
}
