/**
 * Error types for structured error handling in the pivot report generator
 *
 * Every class here is fatal: it aborts the run before output is written.
 * Per-entity and per-metric gaps are not errors; they surface as
 * PivotWarning entries on the output table.
 */

/**
 * Base error class for all report generation errors
 * Provides common properties for error tracking and debugging
 */
export abstract class ReportError extends Error {
  public readonly correlationId: string;
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    correlationId: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
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
      stack: this.stack,
    };
  }
}

/**
 * Error thrown when the pivot configuration is invalid, or when the input
 * lacks the key column the configuration names
 */
export class ConfigurationError extends ReportError {
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
 * Why an input could not be loaded
 */
export type SourceFailureReason =
  | "NOT_FOUND"
  | "READ_FAILED"
  | "SHEET_NOT_FOUND"
  | "INVALID_FORMAT"
  | "FILE_TOO_LARGE"
  | "TIMEOUT";

/**
 * Error thrown when the input cannot be located, read or parsed
 */
export class SourceUnavailableError extends ReportError {
  public readonly sourcePath: string;
  public readonly reason: SourceFailureReason;

  constructor(
    message: string,
    correlationId: string,
    sourcePath: string,
    reason: SourceFailureReason,
    context: Record<string, unknown> = {},
  ) {
    super(message, correlationId, { ...context, sourcePath, reason });
    this.sourcePath = sourcePath;
    this.reason = reason;
  }
}

/**
 * Error thrown when the report cannot be rendered or written
 */
export class SinkUnavailableError extends ReportError {
  public readonly destinationPath: string;

  constructor(
    message: string,
    correlationId: string,
    destinationPath: string,
    context: Record<string, unknown> = {},
  ) {
    super(message, correlationId, { ...context, destinationPath });
    this.destinationPath = destinationPath;
  }
}

/**
 * Type guard for errors raised by this package
 */
export function isReportError(error: unknown): error is ReportError {
  return error instanceof ReportError;
}

/**
 * Utility function to generate correlation IDs for run tracking
 */
export function generateCorrelationId(): string {
  return `pivot-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}
