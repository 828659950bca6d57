import { DomainErrorCode, createDomainServiceError } from '@beacon/platform-core';
import type { ProbeErrorCategory } from '../../domains/monitoring/entities/ProbeResult';

const MonitorDomainCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INVALID_ENDPOINT: 'INVALID_ENDPOINT',
} as const;

const MonitorErrorCodes = { ...DomainErrorCode, ...MonitorDomainCodes } as const;

const MonitorErrorBase = createDomainServiceError('Monitor', MonitorErrorCodes);

export class MonitorError extends MonitorErrorBase {
  static configurationError(reason: string) {
    return new MonitorError(`Configuration error: ${reason}`, 500, MonitorErrorCodes.CONFIGURATION_ERROR);
  }

  static invalidEndpoint(reason: string) {
    return new MonitorError(`Invalid endpoint definition: ${reason}`, 400, MonitorErrorCodes.INVALID_ENDPOINT);
  }
}

/**
 * Raised inside a probe attempt. Thrown so the breaker and retry layers can see
 * it, then turned back into a ProbeResult before the probe returns.
 */
export class ProbeFailure extends Error {
  constructor(
    public readonly category: ProbeErrorCategory,
    message: string,
    public readonly statusCode: number | null = null,
    public readonly responseTimeMs: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProbeFailure';
  }
}
