import logger from './logger';

/**
 * Retries an operation that failed with a transient lock error (busy SQLite
 * database, PostgreSQL deadlock or serialization failure), with exponential
 * backoff. Any other error is re-thrown immediately.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  isRetryable: (error: unknown) => boolean,
  maxRetries: number = 3,
  delayMs: number = 100
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (!isRetryable(error) || attempt === maxRetries - 1) {
        throw error;
      }

      const delay = delayMs * Math.pow(2, attempt);
      await new Promise((resolve) => setTimeout(resolve, delay));

      logger.warn(`Retrying operation after transient storage error, attempt ${attempt + 1}/${maxRetries}`);
    }
  }

  throw lastError ?? new Error('Retry operation failed');
}
