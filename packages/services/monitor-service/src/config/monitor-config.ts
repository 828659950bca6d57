/**
 * Monitor service configuration, read from environment variables
 */

import { z } from 'zod';
import { MonitorError } from '../application/errors';

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform(value => (value === undefined ? defaultValue : ['true', '1', 'yes'].includes(value)));

const int = (defaultValue: number, min: number) => z.coerce.number().int().min(min).default(defaultValue);
const num = (defaultValue: number, min: number) => z.coerce.number().min(min).default(defaultValue);

const envSchema = z.object({
  PORT: int(3100, 1),
  DATABASE_URL: z.string().min(1).optional(),
  ENDPOINTS_FILE: z.string().min(1).optional(),
  REDIS_URL: z.string().min(1).optional(),

  NOTIFICATIONS_ENABLED: booleanFlag(true),
  NOTIFICATION_COOLDOWN_SECONDS: int(300, 0),
  NOTIFICATION_SEND_RECOVERY: booleanFlag(true),
  WEBHOOK_URL: z.string().url().optional(),
  WEBHOOK_TIMEOUT_SECONDS: int(10, 1),
  WEBHOOK_RETRY_COUNT: int(3, 1),
  WEBHOOK_RETRY_DELAY_SECONDS: num(5, 0),

  MAX_CONCURRENT_CHECKS: int(20, 1),
  PROBE_DEADLINE_BUFFER_SECONDS: num(2, 0),

  RETRY_ENABLED: booleanFlag(true),
  RETRY_MAX_ATTEMPTS: int(3, 1),
  RETRY_BASE_DELAY_SECONDS: num(1, 0),
  RETRY_MULTIPLIER: num(2, 1),
  RETRY_MAX_DELAY_SECONDS: num(60, 0),
  RETRY_JITTER: booleanFlag(true),

  BREAKER_FAILURE_THRESHOLD: int(3, 1),
  BREAKER_RECOVERY_TIMEOUT_SECONDS: num(30, 0),
  BREAKER_SUCCESS_THRESHOLD: int(2, 1),

  CHECK_HISTORY_DAYS: int(90, 1),
  RETENTION_CRON: z.string().min(1).default('0 3 * * *'),
});

export interface MonitorConfig {
  port: number;
  databaseUrl?: string;
  endpointsFile?: string;
  redisUrl?: string;
  notifications: {
    enabled: boolean;
    cooldownSeconds: number;
    sendRecovery: boolean;
    webhook?: { url: string; timeoutSeconds: number; retryCount: number; retryDelaySeconds: number };
  };
  probe: {
    maxConcurrentChecks: number;
    deadlineBufferSeconds: number;
  };
  retry: {
    enabled: boolean;
    maxAttempts: number;
    baseDelayMs: number;
    multiplier: number;
    maxDelayMs: number;
    jitter: boolean;
  };
  breaker: {
    failureThreshold: number;
    recoveryTimeoutMs: number;
    successThreshold: number;
  };
  retention: {
    checkHistoryDays: number;
    cronExpression: string;
  };
}

export function loadMonitorConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  // Empty strings count as unset
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw MonitorError.configurationError(`${issue.path.join('.')}: ${issue.message}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    endpointsFile: e.ENDPOINTS_FILE,
    redisUrl: e.REDIS_URL,
    notifications: {
      enabled: e.NOTIFICATIONS_ENABLED,
      cooldownSeconds: e.NOTIFICATION_COOLDOWN_SECONDS,
      sendRecovery: e.NOTIFICATION_SEND_RECOVERY,
      webhook: e.WEBHOOK_URL
        ? {
            url: e.WEBHOOK_URL,
            timeoutSeconds: e.WEBHOOK_TIMEOUT_SECONDS,
            retryCount: e.WEBHOOK_RETRY_COUNT,
            retryDelaySeconds: e.WEBHOOK_RETRY_DELAY_SECONDS,
          }
        : undefined,
    },
    probe: {
      maxConcurrentChecks: e.MAX_CONCURRENT_CHECKS,
      deadlineBufferSeconds: e.PROBE_DEADLINE_BUFFER_SECONDS,
    },
    retry: {
      enabled: e.RETRY_ENABLED,
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_SECONDS * 1000,
      multiplier: e.RETRY_MULTIPLIER,
      maxDelayMs: e.RETRY_MAX_DELAY_SECONDS * 1000,
      jitter: e.RETRY_JITTER,
    },
    breaker: {
      failureThreshold: e.BREAKER_FAILURE_THRESHOLD,
      recoveryTimeoutMs: e.BREAKER_RECOVERY_TIMEOUT_SECONDS * 1000,
      successThreshold: e.BREAKER_SUCCESS_THRESHOLD,
    },
    retention: {
      checkHistoryDays: e.CHECK_HISTORY_DAYS,
      cronExpression: e.RETENTION_CRON,
    },
  };
}
