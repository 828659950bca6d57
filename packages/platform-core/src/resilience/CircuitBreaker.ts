/**
 * Count-based circuit breaker.
 *
 * CLOSED -> OPEN once consecutive counted failures reach failureThreshold.
 * OPEN rejects until recoveryTimeoutMs has passed since the last failure, then the
 * next call moves the breaker to HALF_OPEN before running. HALF_OPEN closes after
 * successThreshold successes and reopens on any counted failure.
 *
 * Admission and counter updates run under a per-instance lock; the guarded
 * operation itself runs outside it.
 */

import pLimit from 'p-limit';
import { DomainError, DomainErrorCode } from '../error-handling/errors';
import { getLogger } from '../logging/logger';
import type {
  BreakerEvent,
  BreakerEventHandler,
  BreakerEventType,
  BreakerSnapshot,
  CircuitBreakerOptions,
  CircuitState,
} from './types';

const logger = getLogger('circuit-breaker');

export const DEFAULT_BREAKER_OPTIONS = {
  failureThreshold: 5,
  recoveryTimeoutMs: 60_000,
  successThreshold: 3,
} as const;

export class CircuitOpenError extends DomainError {
  constructor(
    public readonly breakerName: string,
    public readonly retryAfterMs: number
  ) {
    super(
      `Circuit breaker '${breakerName}' is OPEN. Retry after ${Math.ceil(retryAfterMs / 1000)}s`,
      503,
      undefined,
      DomainErrorCode.CIRCUIT_OPEN,
      { breaker: breakerName, retryAfterMs }
    );
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private successCount = 0;
  private lastFailureAt: number | null = null;

  private readonly lock = pLimit(1);
  private readonly handlers: BreakerEventHandler[] = [];

  private readonly failureThreshold: number;
  private readonly recoveryTimeoutMs: number;
  private readonly successThreshold: number;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly now: () => number;

  constructor(
    public readonly name: string,
    options: CircuitBreakerOptions = {}
  ) {
    this.failureThreshold = options.failureThreshold ?? DEFAULT_BREAKER_OPTIONS.failureThreshold;
    this.recoveryTimeoutMs = options.recoveryTimeoutMs ?? DEFAULT_BREAKER_OPTIONS.recoveryTimeoutMs;
    this.successThreshold = options.successThreshold ?? DEFAULT_BREAKER_OPTIONS.successThreshold;
    this.isFailure = options.isFailure ?? (() => true);
    this.now = options.now ?? Date.now;
  }

  async call<T>(operation: () => Promise<T>): Promise<T> {
    await this.lock(() => this.admit());

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      if (this.isFailure(error)) {
        await this.lock(() => this.recordFailure(error));
      }
      throw error;
    }

    await this.lock(() => this.recordSuccess());
    return result;
  }

  getState(): CircuitState {
    return this.state;
  }

  snapshot(): BreakerSnapshot {
    return {
      name: this.name,
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureAt: this.lastFailureAt === null ? null : new Date(this.lastFailureAt).toISOString(),
      failureThreshold: this.failureThreshold,
      recoveryTimeoutMs: this.recoveryTimeoutMs,
      successThreshold: this.successThreshold,
    };
  }

  /**
   * Administrative reset to CLOSED with cleared counters
   */
  async reset(): Promise<void> {
    await this.lock(() => {
      this.state = 'closed';
      this.failureCount = 0;
      this.successCount = 0;
      this.lastFailureAt = null;
      this.emit('reset');
    });
  }

  onEvent(handler: BreakerEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      const idx = this.handlers.indexOf(handler);
      if (idx >= 0) this.handlers.splice(idx, 1);
    };
  }

  private admit(): void {
    if (this.state !== 'open') return;

    const elapsed = this.lastFailureAt === null ? Infinity : this.now() - this.lastFailureAt;
    if (elapsed < this.recoveryTimeoutMs) {
      this.emit('reject');
      throw new CircuitOpenError(this.name, this.recoveryTimeoutMs - elapsed);
    }

    this.state = 'half_open';
    this.successCount = 0;
    this.emit('half_open');
  }

  private recordSuccess(): void {
    if (this.state === 'half_open') {
      this.successCount++;
      if (this.successCount >= this.successThreshold) {
        this.state = 'closed';
        this.failureCount = 0;
        this.successCount = 0;
        this.emit('close');
        return;
      }
    } else if (this.state === 'closed') {
      this.failureCount = 0;
    }
    this.emit('success');
  }

  private recordFailure(error: unknown): void {
    this.failureCount++;
    this.lastFailureAt = this.now();

    if (this.state === 'half_open') {
      this.state = 'open';
      this.successCount = 0;
      this.emit('open', error);
      return;
    }

    if (this.state === 'closed' && this.failureCount >= this.failureThreshold) {
      this.state = 'open';
      this.emit('open', error);
      return;
    }

    this.emit('failure', error);
  }

  private emit(type: BreakerEventType, error?: unknown): void {
    const event: BreakerEvent = { type, name: this.name, timestamp: this.now(), error, snapshot: this.snapshot() };
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (handlerError) {
        logger.warn('Circuit breaker event handler threw', {
          eventType: type,
          name: this.name,
          error: handlerError instanceof Error ? handlerError.message : String(handlerError),
        });
      }
    }
  }
}
