import { describe, expect, it } from "vitest";
import { LogLevel } from "../interfaces/logger.js";
import { MemoryLogger } from "./memory-logger.js";
import { NullLogger } from "./null-logger.js";

describe("MemoryLogger", () => {
  it("records writes in order", () => {
    const logger = new MemoryLogger();
    logger.write("first", LogLevel.INFO);
    logger.write("second", LogLevel.ERROR);
    expect(logger.records).toEqual([
      { message: "first", level: LogLevel.INFO },
      { message: "second", level: LogLevel.ERROR },
    ]);
    expect(logger.messages()).toEqual(["first", "second"]);
  });

  it("drops writes below its threshold", () => {
    const logger = new MemoryLogger(LogLevel.ERROR);
    logger.write("hidden", LogLevel.WARN);
    logger.write("kept", LogLevel.FATAL);
    expect(logger.messages()).toEqual(["kept"]);
  });

  it("clear() empties the record list", () => {
    const logger = new MemoryLogger();
    logger.write("x", LogLevel.INFO);
    logger.clear();
    expect(logger.records).toEqual([]);
  });
});

describe("NullLogger", () => {
  it("accepts writes and keeps a settable threshold", () => {
    const logger = new NullLogger();
    expect(() => logger.write()).not.toThrow();
    logger.level = LogLevel.FATAL;
    expect(logger.level).toBe(LogLevel.FATAL);
  });
});
