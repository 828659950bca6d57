import type { HttpMethod } from '../entities/Endpoint';

export interface HttpProbeRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HttpProbeResponse {
  status: number;
  /** From dispatch until the body has been fully read */
  responseTimeMs: number;
}

/**
 * Performs one HTTP exchange. Resolves for any HTTP status and rejects with a
 * ProbeFailure for transport problems.
 */
export interface IHttpTransport {
  request(request: HttpProbeRequest): Promise<HttpProbeResponse>;
}
