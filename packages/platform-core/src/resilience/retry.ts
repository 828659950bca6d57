import { DomainError, DomainErrorCode, errorMessage } from '../error-handling/errors';
import { getLogger } from '../logging/logger';
import type { RetryOptions } from './types';

const logger = getLogger('retry');

export const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 60_000,
  jitter: true,
} as const;

export class RetryError extends DomainError {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(
      `Failed after ${attempts} attempts: ${errorMessage(lastError)}`,
      502,
      lastError instanceof Error ? lastError : undefined,
      DomainErrorCode.RETRY_EXHAUSTED,
      { attempts }
    );
    this.name = 'RetryError';
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Delay after failed attempt `attempt` (1-based), before the next one
 */
export function computeBackoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'multiplier' | 'maxDelayMs' | 'jitter'> = {},
  random: () => number = Math.random
): number {
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs;
  const multiplier = options.multiplier ?? DEFAULT_RETRY_OPTIONS.multiplier;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  const jitter = options.jitter ?? DEFAULT_RETRY_OPTIONS.jitter;

  const delay = Math.min(baseDelayMs * Math.pow(multiplier, attempt - 1), maxDelayMs);
  return jitter ? delay * (0.5 + random() * 0.5) : delay;
}

export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_RETRY_OPTIONS.maxAttempts);
  const isRetryable = options.isRetryable ?? (() => true);
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  const { signal, label = 'operation' } = options;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) throw signal.reason;

    try {
      return await operation(attempt);
    } catch (error) {
      if (!isRetryable(error)) throw error;
      lastError = error;

      if (attempt === maxAttempts) {
        logger.warn(`${label} failed after ${attempt} attempts`, { error: errorMessage(error) });
        break;
      }

      const delayMs = computeBackoffDelay(attempt, options, random);
      logger.debug(`${label} attempt ${attempt} failed, retrying`, {
        delayMs: Math.round(delayMs),
        error: errorMessage(error),
      });
      await wait(delayMs, signal);
    }
  }

  throw new RetryError(maxAttempts, lastError);
}

/**
 * Holds default retry options; per-call options override them
 */
export class RetryExecutor {
  constructor(private readonly defaults: RetryOptions = {}) {}

  run<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
    return retryWithBackoff(operation, { ...this.defaults, ...options });
  }
}
