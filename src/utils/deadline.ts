import { TimeoutError } from '../errors/index.js';

/**
 * Race a store call against a deadline.
 *
 * The underlying call is not cancelled when the deadline expires (neither
 * sqlite3 nor the MongoDB driver can abort an in-flight call); the caller
 * just stops waiting for it. A timeoutMs of 0 disables the deadline.
 */
export async function withDeadline<T>(
  operation: Promise<T>,
  timeoutMs: number,
  operationName: string
): Promise<T> {
  if (timeoutMs <= 0) {
    return operation;
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs, operationName)), timeoutMs);
    timer.unref();
  });

  try {
    return await Promise.race([operation, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
