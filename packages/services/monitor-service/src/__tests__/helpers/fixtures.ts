import type { Endpoint } from '../../domains/monitoring/entities/Endpoint';
import type { ProbeResult } from '../../domains/monitoring/entities/ProbeResult';

export function makeEndpoint(overrides: Partial<Endpoint> = {}): Endpoint {
  return {
    id: 'ep-1',
    name: 'api',
    url: 'http://status.example.test/health',
    method: 'GET',
    interval: 60,
    timeout: 5,
    expectedStatus: 200,
    headers: {},
    active: true,
    ...overrides,
  };
}

export function makeResult(success: boolean, checkedAt: Date, overrides: Partial<ProbeResult> = {}): ProbeResult {
  return {
    success,
    statusCode: success ? 200 : 503,
    responseTimeMs: success ? 100 : null,
    errorCategory: success ? null : 'StatusMismatch',
    errorMessage: success ? null : 'Expected status 200, got 503',
    checkedAt,
    ...overrides,
  };
}

export function mockLogger() {
  return {
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    debug: () => undefined,
    log: () => undefined,
  };
}
