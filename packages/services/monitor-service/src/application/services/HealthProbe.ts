/**
 * HealthProbe
 *
 * One check of one endpoint: deadline(breaker(retry(limit(http)))).
 * Every outcome, including breaker rejection and the outer deadline, comes back
 * as a ProbeResult.
 */

import pLimit, { type LimitFunction } from 'p-limit';
import {
  CircuitBreakerRegistry,
  CircuitOpenError,
  DeadlineExceededError,
  RetryError,
  RetryExecutor,
  errorMessage,
  getLogger,
  withDeadline,
  type RetryOptions,
} from '@beacon/platform-core';
import type { Endpoint } from '../../domains/monitoring/entities/Endpoint';
import { failedProbe, successfulProbe, type ProbeResult } from '../../domains/monitoring/entities/ProbeResult';
import type { IHealthProbe } from '../../domains/monitoring/interfaces/IHealthProbe';
import type { IHttpTransport } from '../../domains/monitoring/interfaces/IHttpTransport';
import { ProbeFailure } from '../errors';

const logger = getLogger('health-probe');

export const HEALTH_CHECK_BREAKER_PRESET = 'health-check';

export interface HealthProbeOptions {
  /** Added to the endpoint timeout to form the overall deadline */
  deadlineBufferSeconds?: number;
  maxConcurrentChecks?: number;
  useRetry?: boolean;
  retry?: RetryOptions;
}

const RETRYABLE_CATEGORIES = new Set(['Timeout', 'ConnectionError', 'ClientError', 'StatusMismatch']);

export function isRetryableProbeFailure(error: unknown): boolean {
  return error instanceof ProbeFailure && RETRYABLE_CATEGORIES.has(error.category);
}

export function breakerKeyFor(endpoint: Endpoint): string {
  return `health_check_${endpoint.name}`;
}

export class HealthProbe implements IHealthProbe {
  private readonly limit: LimitFunction;
  private readonly retry: RetryExecutor;
  private readonly deadlineBufferMs: number;
  private readonly useRetry: boolean;

  constructor(
    private readonly transport: IHttpTransport,
    private readonly breakers: CircuitBreakerRegistry,
    options: HealthProbeOptions = {}
  ) {
    this.limit = pLimit(options.maxConcurrentChecks ?? 20);
    this.retry = new RetryExecutor({ ...options.retry, isRetryable: isRetryableProbeFailure });
    this.deadlineBufferMs = (options.deadlineBufferSeconds ?? 2) * 1000;
    this.useRetry = options.useRetry ?? true;
  }

  async check(endpoint: Endpoint): Promise<ProbeResult> {
    const startedAt = Date.now();
    const deadlineMs = endpoint.timeout * 1000 + this.deadlineBufferMs;
    const breaker = this.breakers.forPreset(HEALTH_CHECK_BREAKER_PRESET, breakerKeyFor(endpoint));

    try {
      const result = await withDeadline(
        signal =>
          breaker.call(() =>
            this.useRetry
              ? this.retry.run(() => this.attempt(endpoint, signal), { signal, label: `check ${endpoint.name}` })
              : this.attempt(endpoint, signal)
          ),
        deadlineMs,
        `Health check for ${endpoint.name}`
      );
      logger.debug('Health check succeeded', {
        endpointId: endpoint.id,
        statusCode: result.statusCode,
        responseTimeMs: result.responseTimeMs,
      });
      return result;
    } catch (error) {
      const result = this.toFailedResult(error, Date.now() - startedAt);
      logger.info('Health check failed', {
        endpointId: endpoint.id,
        category: result.errorCategory,
        error: result.errorMessage,
      });
      return result;
    }
  }

  private async attempt(endpoint: Endpoint, signal: AbortSignal): Promise<ProbeResult> {
    const response = await this.limit(() =>
      this.transport.request({
        method: endpoint.method,
        url: endpoint.url,
        headers: endpoint.headers,
        body: endpoint.body,
        timeoutMs: endpoint.timeout * 1000,
        signal,
      })
    );

    if (response.status !== endpoint.expectedStatus) {
      throw new ProbeFailure(
        'StatusMismatch',
        `Expected status ${endpoint.expectedStatus}, got ${response.status}`,
        response.status,
        response.responseTimeMs
      );
    }

    return successfulProbe(response.status, response.responseTimeMs);
  }

  private toFailedResult(error: unknown, elapsedMs: number): ProbeResult {
    if (error instanceof ProbeFailure) {
      return failedProbe(error.category, error.message, {
        statusCode: error.statusCode,
        responseTimeMs: error.responseTimeMs ?? elapsedMs,
      });
    }
    if (error instanceof RetryError) {
      const last = error.lastError;
      if (last instanceof ProbeFailure) {
        return failedProbe(last.category, `Failed after ${error.attempts} attempts: ${last.message}`, {
          statusCode: last.statusCode,
          responseTimeMs: last.responseTimeMs ?? elapsedMs,
        });
      }
      return failedProbe('Unexpected', error.message, { responseTimeMs: elapsedMs });
    }
    if (error instanceof CircuitOpenError) {
      return failedProbe('CircuitOpen', error.message);
    }
    if (error instanceof DeadlineExceededError) {
      return failedProbe('Timeout', error.message, { responseTimeMs: elapsedMs });
    }
    logger.error('Unexpected health check error', { error: errorMessage(error) });
    return failedProbe('Unexpected', `Unexpected error: ${errorMessage(error)}`, { responseTimeMs: elapsedMs });
  }
}
