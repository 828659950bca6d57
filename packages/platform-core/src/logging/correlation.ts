/**
 * Correlation Context
 *
 * Async correlation ID propagation, used per request and per scheduled tick
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import type { LogContext } from './types';

export const correlationStorage = new AsyncLocalStorage<LogContext>();

export function getCorrelationContext(): LogContext | undefined {
  return correlationStorage.getStore();
}

export function runWithContext<T>(context: LogContext, fn: () => T): T {
  return correlationStorage.run(context, fn);
}

export function generateCorrelationId(): string {
  return randomUUID();
}
