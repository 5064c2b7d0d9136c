/**
 * Error classes raised by the estimator.
 *
 * Every error carries a stable code so that callers can branch on the kind of
 * failure without matching on messages.
 */

export enum ErrorCode {
  // Estimator lifecycle (1xxx)
  NOT_FITTED = "E1000",

  // Input and configuration (2xxx)
  CONFIGURATION_INVALID = "E2000",
  LABEL_UNKNOWN = "E2001",
  LABEL_INVALID = "E2002",
  SHAPE_MISMATCH = "E2003",

  // Persistence (3xxx)
  PERSISTENCE_FAILED = "E3000",
  ARTIFACT_MISSING = "E3001",
  RECORD_MALFORMED = "E3002",
  VARIANT_MISMATCH = "E3003",
  FORMAT_UNSUPPORTED = "E3004",

  // Prediction alignment (4xxx)
  ALIGNMENT_FAILED = "E4000",

  // External engine (5xxx)
  ENGINE_FAILED = "E5000",
  ENGINE_NOT_FOUND = "E5001",
}

/**
 * Base class for every error the estimator raises.
 */
export class EstimatorError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "EstimatorError";
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * A read operation (`predict`, `predictProba`, `save`, ...) ran before `fit` or `load`.
 */
export class NotFittedError extends EstimatorError {
  constructor(className: string) {
    super(
      `This ${className} instance is not fitted yet. Call 'fit' with appropriate arguments before using this estimator.`,
      ErrorCode.NOT_FITTED,
      { className }
    );
    this.name = "NotFittedError";
  }
}

/**
 * Bad training input: mismatched lengths, unknown or empty labels, malformed indicator rows.
 */
export class ConfigurationError extends EstimatorError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIGURATION_INVALID,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
  }
}

/**
 * A saved classifier directory could not be written or read back.
 */
export class PersistenceError extends EstimatorError {
  public readonly path?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PERSISTENCE_FAILED,
    context?: Record<string, unknown> & { path?: string },
    options?: { cause?: unknown }
  ) {
    super(message, code, context, options);
    this.name = "PersistenceError";
    this.path = context?.path;
  }

  toString(): string {
    const location = this.path ? ` at ${this.path}` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * The engine's output could not be mapped back onto the canonical classes.
 */
export class AlignmentError extends EstimatorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.ALIGNMENT_FAILED, context);
    this.name = "AlignmentError";
  }
}

export class EngineError extends EstimatorError {
  public readonly exitCode?: number | null;
  public readonly stderr?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.ENGINE_FAILED,
    context?: Record<string, unknown> & { exitCode?: number | null; stderr?: string },
    options?: { cause?: unknown }
  ) {
    super(message, code, context, options);
    this.name = "EngineError";
    this.exitCode = context?.exitCode;
    this.stderr = context?.stderr;
  }
}
