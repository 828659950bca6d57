import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import http from 'node:http';
import https from 'node:https';
import { getCorrelationContext } from '../logging/correlation';
import { getLogger } from '../logging/logger';

const httpClientLogger = getLogger('http-client');

export interface HttpClientConfig {
  timeoutMs?: number;
  /** Per-agent socket ceiling, shared by every request made through this client */
  maxSockets?: number;
  headers?: Record<string, string>;
  userAgent?: string;
  /** When false, every HTTP status resolves instead of rejecting */
  rejectOnErrorStatus?: boolean;
  maxRedirects?: number;
  /** Set false for clients that call third parties, which should not see our correlation ids */
  forwardCorrelationId?: boolean;
}

/**
 * Axios instance over keep-alive agents. One client is shared by all callers
 * of a component so connections are pooled.
 */
export class HttpClient {
  readonly axios: AxiosInstance;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;

  constructor(config: HttpClientConfig = {}) {
    const maxSockets = config.maxSockets ?? 20;

    this.httpAgent = new http.Agent({ keepAlive: true, keepAliveMsecs: 1000, maxSockets, maxFreeSockets: 5 });
    this.httpsAgent = new https.Agent({ keepAlive: true, keepAliveMsecs: 1000, maxSockets, maxFreeSockets: 5 });

    const requestConfig: AxiosRequestConfig = {
      timeout: config.timeoutMs ?? 10000,
      maxRedirects: config.maxRedirects ?? 5,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      headers: {
        'user-agent': config.userAgent ?? 'beacon-monitor/1.0',
        ...config.headers,
      },
    };
    if (config.rejectOnErrorStatus === false) {
      requestConfig.validateStatus = () => true;
    }

    this.axios = axios.create(requestConfig);

    if (config.forwardCorrelationId !== false) {
      this.axios.interceptors.request.use(request => {
        const correlationId = getCorrelationContext()?.correlationId;
        if (correlationId && !request.headers.has('x-correlation-id')) {
          request.headers.set('x-correlation-id', correlationId);
        }
        return request;
      });
    }

    httpClientLogger.debug('HTTP client created', { maxSockets, timeoutMs: requestConfig.timeout });
  }

  destroy(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
