export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerOptions {
  /** Consecutive counted failures in CLOSED before the breaker opens */
  failureThreshold?: number;
  /** Time after the last failure before an OPEN breaker admits a trial call */
  recoveryTimeoutMs?: number;
  /** Successes in HALF_OPEN required to close again */
  successThreshold?: number;
  /** Errors for which this returns false pass through without touching counters */
  isFailure?: (error: unknown) => boolean;
  now?: () => number;
}

export interface BreakerSnapshot {
  name: string;
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureAt: string | null;
  failureThreshold: number;
  recoveryTimeoutMs: number;
  successThreshold: number;
}

export type BreakerEventType = 'open' | 'half_open' | 'close' | 'reject' | 'failure' | 'success' | 'reset';

export interface BreakerEvent {
  type: BreakerEventType;
  name: string;
  timestamp: number;
  error?: unknown;
  snapshot: BreakerSnapshot;
}

export type BreakerEventHandler = (event: BreakerEvent) => void;

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  multiplier?: number;
  maxDelayMs?: number;
  /** Scales each delay by a uniform factor in [0.5, 1.0] */
  jitter?: boolean;
  isRetryable?: (error: unknown) => boolean;
  signal?: AbortSignal;
  label?: string;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}
