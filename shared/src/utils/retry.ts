import { logger } from './logging/logger.js';
import { StructuredError } from './errors.js';
import { RETRY } from '../config/constants.js';
import { sleep, calculateBackoffDelay } from './timing.js';

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  useJitter: boolean;
  jitterFactor: number;
  operationName?: string;
  isRetryable?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const DEFAULT_CONFIG: RetryConfig = {
  maxRetries: RETRY.DEFAULT.MAX_ATTEMPTS,
  baseDelayMs: RETRY.DEFAULT.BASE_DELAY_MS,
  maxDelayMs: RETRY.DEFAULT.MAX_DELAY_MS,
  backoffMultiplier: RETRY.DEFAULT.BACKOFF_MULTIPLIER,
  useJitter: true,
  jitterFactor: RETRY.DEFAULT.JITTER_FACTOR,
};

function defaultIsRetryable(error: unknown): boolean {
  return error instanceof StructuredError && error.isRetryable;
}

/**
 * Run `operation`, retrying with exponential backoff while the thrown error
 * is retryable. The last error is rethrown once retries are exhausted.
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const finalConfig: RetryConfig = { ...DEFAULT_CONFIG, ...config };
  const isRetryable = finalConfig.isRetryable ?? defaultIsRetryable;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      const result = await operation();
      if (attempt > 1) {
        logger.info(`Operation succeeded after ${attempt} attempts`, {
          component: 'Retry',
          operationName: finalConfig.operationName,
        });
      }
      return result;
    } catch (error) {
      if (attempt > finalConfig.maxRetries || !isRetryable(error, attempt)) {
        throw error;
      }

      const delayMs = calculateBackoffDelay(attempt, finalConfig);
      logger.warn(`Retrying after failure (attempt ${attempt}/${finalConfig.maxRetries})`, {
        component: 'Retry',
        operationName: finalConfig.operationName,
        delayMs,
        error: error instanceof Error ? error.message : String(error),
      });
      finalConfig.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
