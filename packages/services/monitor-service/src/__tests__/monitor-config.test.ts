import { describe, it, expect } from 'vitest';
import { loadMonitorConfig } from '../config/monitor-config';

describe('loadMonitorConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadMonitorConfig({});

    expect(config).toEqual({
      port: 3100,
      databaseUrl: undefined,
      endpointsFile: undefined,
      redisUrl: undefined,
      notifications: { enabled: true, cooldownSeconds: 300, sendRecovery: true, webhook: undefined },
      probe: { maxConcurrentChecks: 20, deadlineBufferSeconds: 2 },
      retry: { enabled: true, maxAttempts: 3, baseDelayMs: 1000, multiplier: 2, maxDelayMs: 60_000, jitter: true },
      breaker: { failureThreshold: 3, recoveryTimeoutMs: 30_000, successThreshold: 2 },
      retention: { checkHistoryDays: 90, cronExpression: '0 3 * * *' },
    });
  });

  it('reads overrides and converts seconds to milliseconds', () => {
    const config = loadMonitorConfig({
      PORT: '8080',
      REDIS_URL: 'redis://localhost:6379',
      RETRY_BASE_DELAY_SECONDS: '0.5',
      RETRY_JITTER: 'false',
      BREAKER_RECOVERY_TIMEOUT_SECONDS: '45',
      NOTIFICATION_SEND_RECOVERY: 'no',
    });

    expect(config.port).toBe(8080);
    expect(config.redisUrl).toBe('redis://localhost:6379');
    expect(config.retry.baseDelayMs).toBe(500);
    expect(config.retry.jitter).toBe(false);
    expect(config.breaker.recoveryTimeoutMs).toBe(45_000);
    expect(config.notifications.sendRecovery).toBe(false);
  });

  it('configures the webhook only when a URL is set', () => {
    const config = loadMonitorConfig({ WEBHOOK_URL: 'https://hooks.example.test/alerts', WEBHOOK_RETRY_COUNT: '5' });

    expect(config.notifications.webhook).toEqual({
      url: 'https://hooks.example.test/alerts',
      timeoutSeconds: 10,
      retryCount: 5,
      retryDelaySeconds: 5,
    });
  });

  it('treats empty strings as unset', () => {
    expect(loadMonitorConfig({ PORT: '', DATABASE_URL: '' })).toMatchObject({ port: 3100, databaseUrl: undefined });
  });

  it('rejects invalid values with the offending key', () => {
    expect(() => loadMonitorConfig({ RETRY_MAX_ATTEMPTS: '0' })).toThrow(/^Configuration error: RETRY_MAX_ATTEMPTS: /);
    expect(() => loadMonitorConfig({ NOTIFICATIONS_ENABLED: 'maybe' })).toThrow(
      /^Configuration error: NOTIFICATIONS_ENABLED: /
    );
  });
});
