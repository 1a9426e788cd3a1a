/**
 * Retry Logic with Configurable Strategies
 *
 * - exponential, linear or fixed backoff
 * - jitter to spread competing writers apart
 * - per-error retry decision (defaults to ServiceError.retryable)
 *
 * @example
 * ```typescript
 * const { result } = await retry(() => ledger.commitUnit(playerId), {
 *   ...RetryConfigs.optimisticLock,
 *   name: 'WalletLedger',
 * });
 * ```
 */

import { logger } from '../logger.js';
import { getErrorMessage, isServiceError } from '../errors.js';

export type RetryStrategy = 'exponential' | 'linear' | 'fixed';

export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Retry strategy (default: 'exponential') */
  strategy?: RetryStrategy;
  /** Base delay in milliseconds (default: 100) */
  baseDelay?: number;
  /** Maximum delay in milliseconds (default: 5000) */
  maxDelay?: number;
  /** Randomize each delay between 0 and its computed value (default: true) */
  jitter?: boolean;
  /** Name for logging (default: 'Retry') */
  name?: string;
  /** Decide whether an error is worth another attempt */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each retry with the attempt number (1-based) and the error */
  onRetry?: (attempt: number, error: unknown) => void;
}

export interface RetryResult<T> {
  result: T;
  attempts: number;
  totalDelay: number;
}

export function calculateDelay(
  attempt: number,
  strategy: RetryStrategy,
  baseDelay: number,
  maxDelay: number,
): number {
  let delay: number;

  switch (strategy) {
    case 'exponential':
      delay = baseDelay * Math.pow(2, attempt - 1);
      break;
    case 'linear':
      delay = baseDelay * attempt;
      break;
    case 'fixed':
      delay = baseDelay;
      break;
  }

  return Math.min(delay, maxDelay);
}

/** Retry only errors that declare themselves retryable. */
export function isRetryableServiceError(error: unknown): boolean {
  return isServiceError(error) && error.retryable;
}

export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = {},
): Promise<RetryResult<T>> {
  const {
    maxRetries = 3,
    strategy = 'exponential',
    baseDelay = 100,
    maxDelay = 5000,
    jitter = true,
    name = 'Retry',
    isRetryable = isRetryableServiceError,
    onRetry,
  } = config;

  let lastError: unknown;
  let totalDelay = 0;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      const result = await fn(attempt);

      if (attempt > 0) {
        logger.info(`${name}: Operation succeeded after ${attempt} retry(ies)`, {
          attempts: attempt + 1,
          totalDelay,
        });
      }

      return { result, attempts: attempt + 1, totalDelay };
    } catch (error) {
      lastError = error;

      if (!isRetryable(error)) {
        throw error;
      }

      if (attempt < maxRetries) {
        const delay = calculateDelay(attempt + 1, strategy, baseDelay, maxDelay);
        const finalDelay = jitter ? Math.floor(Math.random() * delay) : delay;
        totalDelay += finalDelay;

        logger.debug(`${name}: Retrying after ${finalDelay}ms`, {
          attempt: attempt + 1,
          maxRetries,
          error: getErrorMessage(error),
        });
        onRetry?.(attempt + 1, error);

        if (finalDelay > 0) {
          await new Promise(resolve => setTimeout(resolve, finalDelay));
        }
      }
    }
  }

  logger.error(`${name}: All retries exhausted`, {
    maxRetries,
    totalDelay,
    error: getErrorMessage(lastError),
  });

  throw lastError;
}

/**
 * Common retry configurations
 */
export const RetryConfigs = {
  /** Short, tight retries for optimistic-lock conflicts */
  optimisticLock: {
    maxRetries: 5,
    strategy: 'exponential',
    baseDelay: 10,
    maxDelay: 200,
    jitter: true,
  },

  /** Standard retries for connections and remote calls */
  standard: {
    maxRetries: 5,
    strategy: 'exponential',
    baseDelay: 200,
    maxDelay: 5000,
    jitter: true,
  },
} satisfies Record<string, RetryConfig>;
