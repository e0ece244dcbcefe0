/**
 * Public test utilities, exported from the `"loghost/testing"` entry point.
 * Consumers can import these helpers to assert on what their code logs.
 */
export type { LogRecord } from "./adapters/memory-logger.js";
export { MemoryLogger } from "./adapters/memory-logger.js";
export { NullLogger } from "./adapters/null-logger.js";
