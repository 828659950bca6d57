import { performance } from 'node:perf_hooks';
import { isAxiosError } from 'axios';
import { HttpClient, errorMessage, type HttpClientConfig } from '@beacon/platform-core';
import { ProbeFailure } from '../../application/errors';
import type { HttpMethod } from '../../domains/monitoring/entities/Endpoint';
import type {
  HttpProbeRequest,
  HttpProbeResponse,
  IHttpTransport,
} from '../../domains/monitoring/interfaces/IHttpTransport';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);
const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
]);
const METHODS_WITH_BODY = new Set<HttpMethod>(['POST', 'PUT', 'PATCH']);

export function classifyTransportError(error: unknown, elapsedMs: number): ProbeFailure {
  if (!isAxiosError(error)) {
    return new ProbeFailure('Unexpected', `Unexpected error: ${errorMessage(error)}`, null, elapsedMs, {
      cause: error,
    });
  }

  const code = error.code ?? '';
  if (TIMEOUT_CODES.has(code)) {
    return new ProbeFailure('Timeout', `Request timed out: ${error.message}`, null, elapsedMs, { cause: error });
  }
  if (CONNECTION_CODES.has(code)) {
    return new ProbeFailure('ConnectionError', `Connection error: ${error.message}`, null, elapsedMs, {
      cause: error,
    });
  }
  return new ProbeFailure('ClientError', `HTTP client error: ${error.message}`, null, elapsedMs, { cause: error });
}

/**
 * Probe transport over a shared keep-alive axios client
 */
export class AxiosHttpTransport implements IHttpTransport {
  private readonly client: HttpClient;

  constructor(config: Pick<HttpClientConfig, 'maxSockets' | 'userAgent'> = {}) {
    this.client = new HttpClient({ ...config, rejectOnErrorStatus: false, forwardCorrelationId: false });
  }

  async request(request: HttpProbeRequest): Promise<HttpProbeResponse> {
    const startedAt = performance.now();
    try {
      const response = await this.client.axios.request({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: METHODS_WITH_BODY.has(request.method) ? request.body : undefined,
        timeout: request.timeoutMs,
        signal: request.signal,
        responseType: 'arraybuffer',
      });
      return { status: response.status, responseTimeMs: performance.now() - startedAt };
    } catch (error) {
      throw classifyTransportError(error, performance.now() - startedAt);
    }
  }

  close(): void {
    this.client.destroy();
  }
}
