/**
 * Unified Error Hierarchy
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - Retry/recovery strategy hints
 * - Structured logging support
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',

  // Source (relational store) Errors
  DATABASE_CONNECTION_FAILED = 'DATABASE_CONNECTION_FAILED',
  DATABASE_QUERY_FAILED = 'DATABASE_QUERY_FAILED',
  SOURCE_RELATION_UNAVAILABLE = 'SOURCE_RELATION_UNAVAILABLE',

  // Destination (document store) Errors
  DESTINATION_CONNECTION_FAILED = 'DESTINATION_CONNECTION_FAILED',
  DESTINATION_WRITE_FAILED = 'DESTINATION_WRITE_FAILED',
  DESTINATION_INDEX_FAILED = 'DESTINATION_INDEX_FAILED',

  // Deadlines
  OPERATION_TIMEOUT = 'OPERATION_TIMEOUT',

  // Build lifecycle
  BUILD_PHASE_FAILED = 'BUILD_PHASE_FAILED',
  BUILD_CANCELLED = 'BUILD_CANCELLED',

  // Configuration Errors (permanent)
  CONFIG_INVALID = 'CONFIG_INVALID',

  // System Errors (permanent)
  SYSTEM_INVALID_STATE = 'SYSTEM_INVALID_STATE',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'read', 'insertMany') */
  operation?: string;

  /** Entity type being operated on (e.g., 'relation', 'collection') */
  entityType?: string;

  /** Entity ID if applicable */
  entityId?: string | number;

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Attempt number if retrying */
  attemptNumber?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors should extend this class
 */
export abstract class ApplicationError extends Error {
  /**
   * Machine-readable error code
   */
  public readonly code: ErrorCode;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  /**
   * Whether this error is retryable
   */
  public readonly retryable: boolean;

  /**
   * Rich context for logging and debugging
   */
  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  public override readonly cause?: Error;

  /**
   * Timestamp when error was created
   */
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      isOperational?: boolean;
      retryable?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// VALIDATION ERRORS
// ============================================

export class ValidationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

/**
 * A record from a source relation does not have the expected columns or types
 */
export class SchemaValidationError extends ValidationError {
  constructor(
    public readonly errors: Array<{ path: string; message: string }>,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Schema validation failed: ${errors.length} error(s)`,
      { ...context, metadata: { ...context?.metadata, errors } }
    );
  }
}

// ============================================
// OPERATIONAL ERRORS
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      isOperational: true,
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// Source database errors
export class DatabaseError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DATABASE_QUERY_FAILED,
    retryable = true,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, retryable, context, cause);
  }
}

/**
 * A required relation cannot be read at all. Fatal before any write happens.
 */
export class SourceUnavailableError extends DatabaseError {
  constructor(
    public readonly relation: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Source relation unavailable: ${relation}`,
      ErrorCode.SOURCE_RELATION_UNAVAILABLE,
      false,
      { ...context, entityType: 'relation', entityId: relation },
      cause
    );
  }
}

// Destination store errors
export class DocumentStoreError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DESTINATION_WRITE_FAILED,
    retryable = false,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, retryable, context, cause);
  }
}

/**
 * A batch write failed. Earlier batches stay committed; nothing is rolled back.
 */
export class BatchWriteError extends DocumentStoreError {
  constructor(
    public readonly collection: string,
    public readonly batchNumber: number,
    public readonly committedCount: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Batch ${batchNumber} failed writing to '${collection}' after ${committedCount} committed document(s)`,
      ErrorCode.DESTINATION_WRITE_FAILED,
      false,
      {
        ...context,
        entityType: 'collection',
        entityId: collection,
        metadata: { ...context?.metadata, batchNumber, committedCount },
      },
      cause
    );
  }
}

/**
 * Secondary index creation failed. Documents already committed remain valid.
 */
export class IndexCreationError extends DocumentStoreError {
  constructor(
    public readonly collection: string,
    public readonly indexName: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Failed to create index '${indexName}' on '${collection}'`,
      ErrorCode.DESTINATION_INDEX_FAILED,
      false,
      {
        ...context,
        entityType: 'collection',
        entityId: collection,
        metadata: { ...context?.metadata, indexName },
      },
      cause
    );
  }
}

/**
 * A store call did not settle before its deadline
 */
export class TimeoutError extends OperationalError {
  constructor(
    public readonly timeoutMs: number,
    public readonly operationName: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `${operationName} timed out after ${timeoutMs}ms`,
      ErrorCode.OPERATION_TIMEOUT,
      true,
      { ...context, operation: operationName, durationMs: timeoutMs }
    );
  }
}

// ============================================
// BUILD LIFECYCLE ERRORS
// ============================================

/**
 * Fatal failure inside one build phase.
 * Keeps the phase name and the underlying cause for the final report.
 */
export class BuildPhaseError extends ApplicationError {
  constructor(
    public readonly phase: string,
    cause: Error,
    context?: ErrorContext
  ) {
    super(`Build failed during phase '${phase}': ${cause.message}`, ErrorCode.BUILD_PHASE_FAILED, {
      isOperational: true,
      retryable: cause instanceof ApplicationError ? cause.retryable : false,
      context: { ...context, operation: phase },
      cause,
    });
  }
}

export class BuildCancelledError extends OperationalError {
  constructor(public readonly phase: string, context?: ErrorContext) {
    super(
      `Build cancelled before phase '${phase}'`,
      ErrorCode.BUILD_CANCELLED,
      false,
      { ...context, operation: phase }
    );
  }
}

// ============================================
// PERMANENT ERRORS (Not Retryable)
// ============================================

export class PermanentError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      isOperational: false, // These are programmer errors
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}

export class InvalidStateError extends PermanentError {
  constructor(
    public readonly expectedState: string,
    public readonly actualState: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Invalid state: expected '${expectedState}', got '${actualState}'`,
      ErrorCode.SYSTEM_INVALID_STATE,
      { ...context, metadata: { ...context?.metadata, expectedState, actualState } }
    );
  }
}
