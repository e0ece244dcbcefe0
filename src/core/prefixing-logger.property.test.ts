import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { MemoryLogger } from "../adapters/memory-logger.js";
import { LogLevel } from "../interfaces/logger.js";
import { PrefixingLogger } from "./prefixing-logger.js";

const methods = ["debug", "info", "warn", "error", "fatal"] as const;
const levels = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  fatal: LogLevel.FATAL,
};

describe("PrefixingLogger property tests", () => {
  it("every literal message is written once, prefixed, at the method's level", () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), fc.constantFrom(...methods), (name, msg, method) => {
        const backend = new MemoryLogger();
        new PrefixingLogger(backend, name)[method](msg);
        expect(backend.records).toEqual([{ message: `${name}: ${msg}`, level: levels[method] }]);
      }),
    );
  });

  it("two owners sharing a backend never exchange prefixes", () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), fc.string(), (a, b, msg) => {
        fc.pre(a !== b);
        const backend = new MemoryLogger();
        new PrefixingLogger(backend, a).info(msg);
        new PrefixingLogger(backend, b).info(msg);
        expect(backend.messages()).toEqual([`${a}: ${msg}`, `${b}: ${msg}`]);
      }),
    );
  });

  it("template arguments are substituted verbatim as text", () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), (left, right) => {
        const backend = new MemoryLogger();
        new PrefixingLogger(backend, "P").info("{0}|{1}", left, right);
        expect(backend.messages()).toEqual([`P: ${left}|${right}`]);
      }),
    );
  });
});
