export type * from './types';
export * from './CircuitBreaker';
export * from './CircuitBreakerRegistry';
export * from './retry';
export * from './deadline';
