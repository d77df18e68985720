/**
 * Timing Utilities
 *
 * Centralized module for sleep and exponential backoff calculations.
 * All retry-related timing logic should use these functions to ensure
 * consistent behavior across the codebase.
 */

import { setTimeout as delay } from 'timers/promises';

import { RETRY } from '../config/constants.js';

/**
 * Configuration for backoff delay calculations.
 */
export interface BackoffConfig {
  /** Base delay in milliseconds */
  baseDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential growth (default: 2) */
  backoffMultiplier: number;
  /** Whether to apply jitter (default: true) */
  useJitter: boolean;
  /** Jitter factor as a fraction of delay (default: 0.3 = 30%) */
  jitterFactor: number;
}

const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  baseDelayMs: RETRY.DEFAULT.BASE_DELAY_MS,
  maxDelayMs: RETRY.DEFAULT.MAX_DELAY_MS,
  backoffMultiplier: RETRY.DEFAULT.BACKOFF_MULTIPLIER,
  useJitter: true,
  jitterFactor: RETRY.DEFAULT.JITTER_FACTOR,
};

/**
 * Sleep for a specified number of milliseconds.
 *
 * @example
 * ```typescript
 * await sleep(1000); // Wait 1 second
 * ```
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Sleep that ends early when `signal` aborts.
 *
 * @returns false when the wait was cut short by the signal
 */
export async function sleepUnlessAborted(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) {
    return false;
  }
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal.aborted) {
      return false;
    }
    throw error;
  }
}

/**
 * Calculate exponential backoff delay for a 1-based attempt number.
 *
 * Delay = min(baseDelayMs * backoffMultiplier^(attempt - 1), maxDelayMs),
 * then +/- jitterFactor when jitter is enabled, never below zero.
 */
export function calculateBackoffDelay(attempt: number, config: Partial<BackoffConfig> = {}): number {
  const finalConfig: BackoffConfig = { ...DEFAULT_BACKOFF_CONFIG, ...config };
  const exponential = finalConfig.baseDelayMs * Math.pow(finalConfig.backoffMultiplier, Math.max(0, attempt - 1));
  const capped = Math.min(exponential, finalConfig.maxDelayMs);

  if (!finalConfig.useJitter) {
    return capped;
  }

  const jitterAmount = capped * finalConfig.jitterFactor * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitterAmount));
}
