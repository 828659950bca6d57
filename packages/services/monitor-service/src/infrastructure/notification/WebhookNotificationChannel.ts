import {
  CircuitBreakerRegistry,
  HttpClient,
  RetryExecutor,
  type CircuitBreaker,
  type RetryOptions,
} from '@beacon/platform-core';
import type { INotificationChannel, NotificationMessage } from './NotificationMessage';

export interface WebhookChannelConfig {
  url: string;
  timeoutSeconds: number;
  retryCount: number;
  retryDelaySeconds: number;
  headers?: Record<string, string>;
}

export const WEBHOOK_BREAKER_NAME = 'notification:webhook';

/**
 * Posts a JSON payload per notification. Attempts are spaced by a fixed delay
 * and the whole delivery runs behind the shared webhook breaker.
 */
export class WebhookNotificationChannel implements INotificationChannel {
  readonly name = 'webhook';
  private readonly client: HttpClient;
  private readonly retry: RetryExecutor;
  private readonly breaker: CircuitBreaker;

  constructor(
    private readonly config: WebhookChannelConfig,
    breakers: CircuitBreakerRegistry,
    retryOverrides: Pick<RetryOptions, 'sleep'> = {}
  ) {
    this.client = new HttpClient({
      timeoutMs: config.timeoutSeconds * 1000,
      maxSockets: 5,
      headers: { 'content-type': 'application/json', ...config.headers },
    });
    this.retry = new RetryExecutor({
      maxAttempts: Math.max(1, config.retryCount),
      baseDelayMs: config.retryDelaySeconds * 1000,
      multiplier: 1,
      jitter: false,
      label: 'webhook notification',
      ...retryOverrides,
    });
    this.breaker = breakers.forPreset('notification', WEBHOOK_BREAKER_NAME);
  }

  async send(message: NotificationMessage): Promise<void> {
    const payload = {
      text: message.subject,
      kind: message.kind,
      endpoint: { id: message.endpointId, name: message.endpointName, url: message.url },
      error: message.error,
      statusCode: message.statusCode,
      timestamp: message.timestamp,
    };

    await this.breaker.call(() =>
      this.retry.run(async () => {
        await this.client.axios.post(this.config.url, payload);
      })
    );
  }

  close(): void {
    this.client.destroy();
  }
}
