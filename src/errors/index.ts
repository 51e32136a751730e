/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 * Do not import directly from ApplicationError.ts.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Validation errors
export {
  ValidationError,
  SchemaValidationError,
} from './ApplicationError.js';

// Operational errors
export {
  OperationalError,
  DatabaseError,
  SourceUnavailableError,
  DocumentStoreError,
  BatchWriteError,
  IndexCreationError,
  TimeoutError,
} from './ApplicationError.js';

// Build lifecycle errors
export {
  BuildPhaseError,
  BuildCancelledError,
} from './ApplicationError.js';

// Permanent errors (not retryable)
export {
  PermanentError,
  ConfigurationError,
  InvalidStateError,
} from './ApplicationError.js';

// Retry strategies
export {
  RetryStrategy,
  DEFAULT_RETRY_POLICY,
  DATABASE_RETRY_POLICY,
  createRetryStrategy,
} from './RetryStrategy.js';

// Retry strategy types (type-only exports)
export type {
  RetryPolicy,
  RetryResult,
} from './RetryStrategy.js';
