/**
 * Retry Strategy System
 *
 * Provides configurable retry policies for handling transient failures.
 * Works in conjunction with the ApplicationError hierarchy to make
 * retry decisions based on error type and context.
 */

import { ApplicationError, ErrorCode } from './ApplicationError.js';
import { logger } from '../utils/logging.js';

// ============================================
// RETRY POLICY CONFIGURATION
// ============================================

export interface RetryPolicy {
  /**
   * Maximum number of attempts, including the first one
   */
  maxAttempts: number;

  /**
   * Initial delay in milliseconds before first retry
   */
  initialDelayMs: number;

  /**
   * Maximum delay in milliseconds between retries
   */
  maxDelayMs: number;

  /**
   * Backoff multiplier (e.g., 2 for exponential backoff)
   */
  backoffMultiplier: number;

  /**
   * Jitter factor (0-1) to randomize retry delays
   */
  jitterFactor: number;

  /**
   * Error codes that should be retried
   */
  retryableErrorCodes?: ErrorCode[];

  /**
   * Custom function to determine if error is retryable
   * If provided, this overrides the error's built-in retryable flag
   */
  shouldRetry?: (error: Error, attemptNumber: number) => boolean;

  /**
   * Callback invoked before each retry attempt
   */
  onRetry?: (error: Error, attemptNumber: number, delayMs: number) => void;
}

export type RetryResult<T> =
  | { success: true; value: T; attemptCount: number; totalDelayMs: number }
  | { success: false; error: Error; attemptCount: number; totalDelayMs: number };

// ============================================
// PREDEFINED RETRY POLICIES
// ============================================

/**
 * Default retry policy for general operational errors
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Source database reads: fast retries for busy/locked files and expired deadlines
 */
export const DATABASE_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
  retryableErrorCodes: [
    ErrorCode.DATABASE_QUERY_FAILED,
    ErrorCode.DATABASE_CONNECTION_FAILED,
    ErrorCode.OPERATION_TIMEOUT,
  ],
};

// ============================================
// RETRY STRATEGY CLASS
// ============================================

export class RetryStrategy {
  constructor(private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY) {}

  /**
   * Execute an operation with retry logic
   */
  async execute<T>(
    operation: () => Promise<T>,
    operationName: string = 'operation'
  ): Promise<T> {
    const result = await this.executeWithResult(operation, operationName);
    if (result.success) {
      return result.value;
    }
    throw result.error;
  }

  /**
   * Execute an operation and return detailed result
   */
  async executeWithResult<T>(
    operation: () => Promise<T>,
    operationName: string = 'operation'
  ): Promise<RetryResult<T>> {
    let attemptCount = 0;
    let totalDelayMs = 0;

    for (;;) {
      attemptCount++;

      try {
        const value = await operation();
        return { success: true, value, attemptCount, totalDelayMs };
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));

        if (!this.shouldRetryError(lastError, attemptCount) || attemptCount >= this.policy.maxAttempts) {
          logger.warn(`${operationName} failed after ${attemptCount} attempt(s)`, {
            error: lastError.message,
            attemptCount,
            totalDelayMs,
          });

          return { success: false, error: lastError, attemptCount, totalDelayMs };
        }

        const delayMs = this.calculateDelay(attemptCount);
        totalDelayMs += delayMs;

        if (this.policy.onRetry) {
          this.policy.onRetry(lastError, attemptCount, delayMs);
        }

        logger.info(`Retrying ${operationName} after error`, {
          error: lastError.message,
          attemptNumber: attemptCount,
          nextAttemptIn: delayMs,
          totalAttempts: this.policy.maxAttempts,
        });

        await this.sleep(delayMs);
      }
    }
  }

  /**
   * Determine if an error should be retried
   */
  private shouldRetryError(error: Error, attemptNumber: number): boolean {
    // Custom retry logic takes precedence
    if (this.policy.shouldRetry) {
      return this.policy.shouldRetry(error, attemptNumber);
    }

    if (error instanceof ApplicationError) {
      if (!error.retryable) {
        return false;
      }

      if (this.policy.retryableErrorCodes) {
        return this.policy.retryableErrorCodes.includes(error.code);
      }

      return true;
    }

    // Unknown errors are not retried unless shouldRetry says so
    return false;
  }

  /**
   * Calculate delay before next retry using exponential backoff with jitter
   */
  private calculateDelay(attemptNumber: number): number {
    const exponentialDelay =
      this.policy.initialDelayMs *
      Math.pow(this.policy.backoffMultiplier, attemptNumber - 1);

    const cappedDelay = Math.min(exponentialDelay, this.policy.maxDelayMs);

    const jitter = cappedDelay * this.policy.jitterFactor * (Math.random() - 0.5);

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

// ============================================
// HELPER FUNCTIONS
// ============================================

/**
 * Create a retry strategy with custom policy
 */
export function createRetryStrategy(
  policy: Partial<RetryPolicy>
): RetryStrategy {
  return new RetryStrategy({ ...DEFAULT_RETRY_POLICY, ...policy });
}
