/**
 * Composite-template formatting for log messages.
 *
 * Templates use indexed placeholders, `{index[,alignment][:formatString]}`,
 * with `{{` and `}}` as literal braces. Values are rendered by a
 * {@link FormatProvider}: the invariant provider is locale independent, a
 * locale provider renders numbers and dates through `Intl`.
 * @module
 */

import { FormatError } from "../errors.js";

const NUMBER_FORMAT = /^([DdFfNnXx])(\d{0,2})$/;
const PLACEHOLDER = /^\s*(\d+)\s*(?:,\s*(-?\d+)\s*)?(?::(.*))?$/s;

/** Widest padding a placeholder may request. */
const MAX_ALIGNMENT = 1_000_000;

/** Locale used for grouping and decimal separators when no locale is set. */
const INVARIANT_NUMBER_LOCALE = "en-US";

export class FormatProvider {
  static readonly invariant = new FormatProvider(undefined);

  static forLocale(locale: string): FormatProvider {
    let canonical: string;
    try {
      [canonical] = Intl.getCanonicalLocales(locale);
    } catch (err) {
      throw new FormatError(`Invalid locale "${locale}"`, { cause: err });
    }
    return new FormatProvider(canonical);
  }

  protected constructor(readonly locale: string | undefined) {}

  /** Render one value, honoring a standard numeric format string when given. */
  formatValue(value: unknown, formatString?: string): string {
    if (value === null || value === undefined) return "";
    if (typeof value === "number" || typeof value === "bigint") {
      return formatString ? this.formatNumber(value, formatString) : this.plainNumber(value);
    }
    if (value instanceof Date) {
      if (Number.isNaN(value.getTime())) return "Invalid Date";
      return this.locale ? value.toLocaleString(this.locale) : value.toISOString();
    }
    return defaultText(value);
  }

  private plainNumber(value: number | bigint): string {
    if (!this.locale) return String(value);
    return value.toLocaleString(this.locale, { useGrouping: false, maximumFractionDigits: 20 });
  }

  private formatNumber(value: number | bigint, formatString: string): string {
    const match = NUMBER_FORMAT.exec(formatString);
    if (!match) throw new FormatError(`Unsupported format string "${formatString}"`);
    const [, specifier, digits] = match;
    const precision = digits === "" ? undefined : Number(digits);

    switch (specifier) {
      case "D":
      case "d": {
        const text = integerText(value, formatString, 10);
        const negative = text.startsWith("-");
        const magnitude = (negative ? text.slice(1) : text).padStart(precision ?? 0, "0");
        return negative ? `-${magnitude}` : magnitude;
      }
      case "X":
      case "x": {
        const text = integerText(value, formatString, 16);
        if (text.startsWith("-")) {
          throw new FormatError(`Format "${formatString}" requires a non-negative integer`);
        }
        const padded = text.padStart(precision ?? 0, "0");
        return specifier === "X" ? padded.toUpperCase() : padded;
      }
      default: {
        const fractionDigits = precision ?? 2;
        return new Intl.NumberFormat(this.locale ?? INVARIANT_NUMBER_LOCALE, {
          minimumFractionDigits: fractionDigits,
          maximumFractionDigits: fractionDigits,
          useGrouping: specifier === "N" || specifier === "n",
        }).format(value);
      }
    }
  }
}

function integerText(value: number | bigint, formatString: string, radix: number): string {
  if (typeof value === "number" && !Number.isInteger(value)) {
    throw new FormatError(`Format "${formatString}" requires an integer, got ${value}`);
  }
  return typeof value === "number" ? BigInt(value).toString(radix) : value.toString(radix);
}

/** Substitute `args` into a composite template. Throws {@link FormatError} on malformed input. */
export function formatTemplate(
  provider: FormatProvider,
  template: string,
  args: readonly unknown[],
): string {
  let out = "";
  let i = 0;
  while (i < template.length) {
    const ch = template[i];
    if (ch === "{") {
      if (template[i + 1] === "{") {
        out += "{";
        i += 2;
        continue;
      }
      const close = template.indexOf("}", i + 1);
      if (close === -1) {
        throw new FormatError(`Unclosed placeholder at position ${i} in "${template}"`);
      }
      out += formatPlaceholder(provider, template.slice(i + 1, close), args);
      i = close + 1;
      continue;
    }
    if (ch === "}") {
      if (template[i + 1] === "}") {
        out += "}";
        i += 2;
        continue;
      }
      throw new FormatError(`Unexpected "}" at position ${i} in "${template}"`);
    }
    out += ch;
    i++;
  }
  return out;
}

function formatPlaceholder(
  provider: FormatProvider,
  body: string,
  args: readonly unknown[],
): string {
  const match = PLACEHOLDER.exec(body);
  if (!match) throw new FormatError(`Invalid placeholder "{${body}}"`);
  const [, indexText, alignmentText, formatString] = match;

  const index = Number(indexText);
  if (index >= args.length) {
    throw new FormatError(
      `Placeholder {${index}} has no matching argument (${args.length} supplied)`,
    );
  }

  const text = provider.formatValue(args[index], formatString || undefined);
  if (alignmentText === undefined) return text;
  const alignment = Number(alignmentText);
  if (Math.abs(alignment) > MAX_ALIGNMENT) {
    throw new FormatError(`Alignment ${alignment} exceeds the maximum of ${MAX_ALIGNMENT}`);
  }
  return alignment < 0 ? text.padEnd(-alignment) : text.padStart(alignment);
}

/** Locale-independent text for any value that is not a number or a date. */
export function defaultText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (value instanceof Error) return errorText(value);
  if (typeof value === "function") return `[Function ${value.name || "anonymous"}]`;
  if (typeof value !== "object") return String(value);
  if (typeof value.toString === "function" && value.toString !== Object.prototype.toString) {
    return String(value);
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // Circular structure or a throwing toJSON
    return String(value);
  }
}

/** `"<name>: <message>"`, followed by ` ---> <cause>` for each link of the cause chain. */
export function errorText(error: unknown): string {
  const seen = new Set<unknown>();
  let text = "";
  let current: unknown = error;
  while (current instanceof Error && !seen.has(current)) {
    seen.add(current);
    text += `${text ? " ---> " : ""}${current.name}: ${current.message}`;
    current = current.cause;
  }
  if (current === undefined || current instanceof Error) return text;
  const tail = defaultText(current);
  return text ? `${text} ---> ${tail}` : tail;
}
