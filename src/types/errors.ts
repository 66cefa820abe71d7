/**
 * Error types for structured error handling in the feature formatting system
 */

/**
 * Base error class for all formatter errors
 * Provides common properties for error tracking and debugging
 */
export abstract class FormatterError extends Error {
  public readonly correlationId: string;
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    correlationId: string,
    context: Record<string, unknown> = {},
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.correlationId = correlationId;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Returns a structured representation of the error for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      correlationId: this.correlationId,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack,
    };
  }
}

/**
 * Error thrown when writing formatted output fails
 *
 * The partially written output is discarded; callers never receive a
 * truncated payload alongside this error.
 */
export class FormatterSerializationError extends FormatterError {
  public readonly formatName: string;
  public readonly rowIndex?: number;

  constructor(
    message: string,
    correlationId: string,
    formatName: string,
    rowIndex?: number,
    cause?: unknown,
    context: Record<string, unknown> = {},
  ) {
    super(message, correlationId, { ...context, formatName, rowIndex }, cause);
    this.formatName = formatName;
    this.rowIndex = rowIndex;
  }
}

/**
 * Error thrown when formatting options are invalid
 */
export class FormatterConfigurationError extends FormatterError {
  public readonly configKey: string;

  constructor(
    message: string,
    correlationId: string,
    configKey: string,
    context: Record<string, unknown> = {},
  ) {
    super(message, correlationId, { ...context, configKey });
    this.configKey = configKey;
  }
}

/**
 * Error thrown when no formatter is registered under a requested name
 */
export class UnsupportedFormatError extends FormatterError {
  public readonly formatName: string;
  public readonly supportedFormats: string[];

  constructor(
    formatName: string,
    supportedFormats: string[],
    correlationId: string,
  ) {
    super(
      `Unsupported output format: ${formatName}. Supported formats: ${supportedFormats.join(", ")}`,
      correlationId,
      { formatName, supportedFormats },
    );
    this.formatName = formatName;
    this.supportedFormats = supportedFormats;
  }
}

/**
 * Utility function to generate correlation IDs for request tracking
 */
export function generateCorrelationId(): string {
  return `fmt-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}
