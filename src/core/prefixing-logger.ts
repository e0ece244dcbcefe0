import type { FullLogger, LeveledLogger, LogArgs } from "../interfaces/logger.js";
import { LogLevel } from "../interfaces/logger.js";
import { errorText, FormatProvider, formatTemplate } from "./format.js";

const PREFIX_SEPARATOR = ": ";

/**
 * FullLogger over a LeveledLogger backend.
 * Every entry point renders one string, prepends `"<name>: "` and issues a
 * single `write` to the backend. Threshold filtering is left to the backend.
 */
export class PrefixingLogger implements FullLogger {
  private readonly prefix: string;

  constructor(
    private readonly inner: LeveledLogger,
    name: string,
  ) {
    this.prefix = `${name}${PREFIX_SEPARATOR}`;
  }

  get level(): LogLevel {
    return this.inner.level;
  }

  set level(level: LogLevel) {
    this.inner.level = level;
  }

  write(message: string, level: LogLevel): void {
    this.inner.write(this.prefix + message, level);
  }

  debug(...args: LogArgs): void {
    this.write(renderLogArgs(args), LogLevel.DEBUG);
  }

  debugException(message: string, error: unknown): void {
    this.write(exceptionMessage(message, error), LogLevel.DEBUG);
  }

  info(...args: LogArgs): void {
    this.write(renderLogArgs(args), LogLevel.INFO);
  }

  infoException(message: string, error: unknown): void {
    this.write(exceptionMessage(message, error), LogLevel.INFO);
  }

  warn(...args: LogArgs): void {
    this.write(renderLogArgs(args), LogLevel.WARN);
  }

  warnException(message: string, error: unknown): void {
    this.write(exceptionMessage(message, error), LogLevel.WARN);
  }

  error(...args: LogArgs): void {
    this.write(renderLogArgs(args), LogLevel.ERROR);
  }

  errorException(message: string, error: unknown): void {
    this.write(exceptionMessage(message, error), LogLevel.ERROR);
  }

  fatal(...args: LogArgs): void {
    this.write(renderLogArgs(args), LogLevel.FATAL);
  }

  fatalException(message: string, error: unknown): void {
    this.write(exceptionMessage(message, error), LogLevel.FATAL);
  }
}

/** Reduce any {@link LogArgs} shape to the final, unprefixed message text. */
export function renderLogArgs(args: LogArgs): string {
  const [first, ...rest] = args;
  if (first instanceof FormatProvider && rest.length > 0) {
    const [subject, ...templateArgs] = rest;
    return typeof subject === "string"
      ? formatTemplate(first, subject, templateArgs)
      : first.formatValue(subject);
  }
  if (typeof first === "string") {
    // A lone string is literal; braces only mean something when args follow
    return rest.length === 0 ? first : formatTemplate(FormatProvider.invariant, first, rest);
  }
  return FormatProvider.invariant.formatValue(first);
}

function exceptionMessage(message: string, error: unknown): string {
  return `${message}: ${errorText(error)}`;
}
