// Retry with exponential backoff and jitter
import { logger } from '@/services/logger';
import { errorMessage } from '@/services/pipeline-errors';

export interface RetryOptions {
  /** Total attempts, first call included. */
  attempts?: number;
  initialDelay?: number;
  maxDelay?: number;
  jitter?: boolean;
  exponentialBase?: number;
  label?: string;
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    attempts = 2,
    initialDelay = 250,
    maxDelay = 5000,
    jitter = true,
    exponentialBase = 2,
    label = 'call',
  } = options;

  let lastError: unknown = new Error('Retry failed');

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === attempts) break;

      const exponentialDelay = initialDelay * Math.pow(exponentialBase, attempt - 1);
      // up to 25% jitter
      const jitterAmount = jitter ? Math.random() * 0.25 * exponentialDelay : 0;
      const delay = Math.min(exponentialDelay + jitterAmount, maxDelay);

      logger.warn(`retry:${label}`, {
        attempt,
        of: attempts,
        delayMs: Math.round(delay),
        error: errorMessage(error),
      });
      if (delay > 0) await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}
