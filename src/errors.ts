export class LoggingError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LoggingError";
    this.code = code;
  }
}

// ── Domain errors ──

/** Malformed composite template, missing argument or unsupported format string. */
export class FormatError extends LoggingError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "FORMAT", options);
    this.name = "FormatError";
  }
}

export class ConfigurationError extends LoggingError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIGURATION", options);
    this.name = "ConfigurationError";
  }
}
