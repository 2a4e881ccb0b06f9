import { ServerError, toApiError } from '../errors/taxonomy';
import type { ApiError } from '../errors/taxonomy';

const DEFAULT_MAX_ATTEMPTS = 3;
const BASE_DELAY_MS = 1000;

export interface RetryAttempt {
  /** Zero-based index of the attempt that just failed. */
  attempt: number;
  delayMs: number;
  elapsedBackoffMs: number;
  error: ApiError;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  sleep: (ms: number) => Promise<void>;
  onRetry?: (attempt: RetryAttempt) => void;
}

export function getDefaultRetryConfig(): RetryConfig {
  return {
    maxAttempts: DEFAULT_MAX_ATTEMPTS,
    baseDelayMs: BASE_DELAY_MS,
    sleep,
  };
}

/** 1s, 2s, 4s, ... with the default base delay. No jitter. */
export function getBackoffDelayMs(attempt: number, baseDelayMs: number = BASE_DELAY_MS): number {
  return baseDelayMs * 2 ** attempt;
}

export async function executeWithRetry<T>(
  operation: () => Promise<T>,
  overrides: Partial<RetryConfig> = {}
): Promise<T> {
  const defaults = getDefaultRetryConfig();
  const maxAttempts = overrides.maxAttempts ?? defaults.maxAttempts;
  const baseDelayMs = overrides.baseDelayMs ?? defaults.baseDelayMs;
  const wait = overrides.sleep ?? defaults.sleep;

  let elapsedBackoffMs = 0;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const classified = toApiError(error);

      if (!classified.retryable || attempt === maxAttempts - 1) {
        throw classified;
      }

      const delayMs = getBackoffDelayMs(attempt, baseDelayMs);
      elapsedBackoffMs += delayMs;
      overrides.onRetry?.({ attempt, delayMs, elapsedBackoffMs, error: classified });
      await wait(delayMs);
    }
  }

  throw new MaxRetriesExceededError(maxAttempts);
}

/**
 * Holds a retry configuration so callers can share one policy.
 * Keeps no state between calls.
 */
export class RetryPolicy {
  constructor(private readonly config: Partial<RetryConfig> = {}) {}

  execute<T>(
    operation: () => Promise<T>,
    maxAttempts: number = this.config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
  ): Promise<T> {
    return executeWithRetry(operation, { ...this.config, maxAttempts });
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class MaxRetriesExceededError extends ServerError {
  constructor(public readonly maxAttempts: number) {
    super(`Maximum retry attempts (${maxAttempts}) exceeded`, null, null, 'network');
    this.name = 'MaxRetriesExceededError';
  }
}
