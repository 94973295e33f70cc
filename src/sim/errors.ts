/**
 * Bad or missing configuration. Raised before any day is simulated.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * A report could not be written. Statistics already computed stay valid.
 */
export class ExportError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ExportError";
  }
}

/** Only raised when the no-repeat guard runs with the "throw" exhaustion policy. */
export class RepeatExhaustedError extends Error {
  constructor(
    public readonly eventName: string,
    public readonly attempts: number
  ) {
    super(`no-repeat guard exhausted after ${attempts} redraws (still "${eventName}")`);
    this.name = "RepeatExhaustedError";
  }
}
