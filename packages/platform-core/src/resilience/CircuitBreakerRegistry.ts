import { getLogger } from '../logging/logger';
import { CircuitBreaker } from './CircuitBreaker';
import type { BreakerEvent, BreakerEventHandler, BreakerSnapshot, CircuitBreakerOptions } from './types';

const logger = getLogger('resilience');

export const BREAKER_PRESETS: Record<string, CircuitBreakerOptions> = {
  'health-check': { failureThreshold: 3, recoveryTimeoutMs: 30_000, successThreshold: 2 },
  notification: { failureThreshold: 5, recoveryTimeoutMs: 60_000, successThreshold: 3 },
};

function logBreakerEvent(event: BreakerEvent): void {
  const meta = {
    circuitBreaker: event.name,
    state: event.snapshot.state,
    failures: event.snapshot.failureCount,
  };
  const error = event.error instanceof Error ? event.error.message : undefined;
  switch (event.type) {
    case 'open':
      logger.warn('Circuit breaker OPENED', { ...meta, error });
      break;
    case 'reject':
      logger.debug('Circuit breaker rejected call', meta);
      break;
    case 'half_open':
      logger.info('Circuit breaker HALF-OPEN, testing recovery', meta);
      break;
    case 'close':
      logger.info('Circuit breaker CLOSED, recovered', meta);
      break;
    case 'reset':
      logger.info('Circuit breaker manually reset', meta);
      break;
    case 'failure':
      logger.debug('Circuit breaker call failed', { ...meta, error });
      break;
    case 'success':
      break;
  }
}

/**
 * Owns one breaker per key. Constructed by the composition root and passed to
 * whatever needs breakers; there is no process-wide instance.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly presets = new Map<string, CircuitBreakerOptions>(Object.entries(BREAKER_PRESETS));
  private readonly handlers: BreakerEventHandler[] = [];

  constructor(private readonly defaults: CircuitBreakerOptions = {}) {
    this.onEvent(logBreakerEvent);
  }

  registerPreset(name: string, options: CircuitBreakerOptions): void {
    this.presets.set(name, options);
  }

  getPreset(name: string): CircuitBreakerOptions | undefined {
    return this.presets.get(name);
  }

  /**
   * Returns the breaker for `name`, creating it on first use. Options only apply at creation.
   */
  get(name: string, options?: CircuitBreakerOptions): CircuitBreaker {
    const existing = this.breakers.get(name);
    if (existing) return existing;

    const breaker = new CircuitBreaker(name, { ...this.defaults, ...options });
    breaker.onEvent(event => this.dispatch(event));
    this.breakers.set(name, breaker);
    return breaker;
  }

  forPreset(preset: string, name: string, overrides: CircuitBreakerOptions = {}): CircuitBreaker {
    return this.get(name, { ...this.presets.get(preset), ...overrides });
  }

  has(name: string): boolean {
    return this.breakers.has(name);
  }

  getAllStates(): Record<string, BreakerSnapshot> {
    const states: Record<string, BreakerSnapshot> = {};
    for (const [name, breaker] of this.breakers) {
      states[name] = breaker.snapshot();
    }
    return states;
  }

  async reset(name: string): Promise<boolean> {
    const breaker = this.breakers.get(name);
    if (!breaker) return false;
    await breaker.reset();
    return true;
  }

  async resetAll(): Promise<void> {
    await Promise.all(Array.from(this.breakers.values(), breaker => breaker.reset()));
  }

  onEvent(handler: BreakerEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      const idx = this.handlers.indexOf(handler);
      if (idx >= 0) this.handlers.splice(idx, 1);
    };
  }

  private dispatch(event: BreakerEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (handlerError) {
        logger.warn('Resilience event handler threw', {
          eventType: event.type,
          name: event.name,
          error: handlerError instanceof Error ? handlerError.message : String(handlerError),
        });
      }
    }
  }
}
