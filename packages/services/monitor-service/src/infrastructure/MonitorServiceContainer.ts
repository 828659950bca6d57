/**
 * Composition root: builds every monitor component from configuration
 */

import type express from 'express';
import { CircuitBreakerRegistry, PeriodicTask, getLogger } from '@beacon/platform-core';
import { HealthProbe, HEALTH_CHECK_BREAKER_PRESET } from '../application/services/HealthProbe';
import type { MonitorConfig } from '../config/monitor-config';
import type { IEndpointRepository } from '../domains/monitoring/repositories/IEndpointRepository';
import type { INotificationLogRepository } from '../domains/monitoring/repositories/INotificationLogRepository';
import type { IProbeResultRepository } from '../domains/monitoring/repositories/IProbeResultRepository';
import { UptimeAggregator } from '../domains/monitoring/services/UptimeAggregator';
import { createApp } from '../presentation/app';
import { RedisCooldownGate, createCooldownGate } from './cooldown';
import { createDatabaseConnection, type DatabaseConnection } from './database/DatabaseConnectionFactory';
import { AxiosHttpTransport } from './http/AxiosHttpTransport';
import { MonitoringScheduler } from './jobs/MonitoringScheduler';
import { ResultRetentionScheduler } from './jobs/ResultRetentionScheduler';
import { LogNotificationChannel } from './notification/LogNotificationChannel';
import { NotificationDispatcher } from './notification/NotificationDispatcher';
import type { INotificationChannel } from './notification/NotificationMessage';
import { WebhookNotificationChannel } from './notification/WebhookNotificationChannel';
import {
  DrizzleEndpointRepository,
  DrizzleNotificationLogRepository,
  DrizzleProbeResultRepository,
  InMemoryEndpointRepository,
  InMemoryNotificationLogRepository,
  InMemoryProbeResultRepository,
  loadEndpointsFile,
} from './repositories';

const logger = getLogger('monitor-service');

const COOLDOWN_REVALIDATE_INTERVAL_MS = 60_000;

interface Repositories {
  endpoints: IEndpointRepository;
  results: IProbeResultRepository;
  notificationLogs: INotificationLogRepository;
  connection: DatabaseConnection | null;
}

export interface MonitorService {
  breakers: CircuitBreakerRegistry;
  scheduler: MonitoringScheduler;
  aggregator: UptimeAggregator;
  retention: ResultRetentionScheduler;
  app: express.Express;
  start(): Promise<void>;
  stop(): Promise<void>;
}

async function createRepositories(config: MonitorConfig): Promise<Repositories> {
  if (config.databaseUrl) {
    const connection = createDatabaseConnection(config.databaseUrl);
    return {
      endpoints: new DrizzleEndpointRepository(connection.db),
      results: new DrizzleProbeResultRepository(connection.db),
      notificationLogs: new DrizzleNotificationLogRepository(connection.db),
      connection,
    };
  }

  const seed = config.endpointsFile ? await loadEndpointsFile(config.endpointsFile) : [];
  logger.warn('DATABASE_URL not set, keeping results in memory', { endpoints: seed.length });
  return {
    endpoints: new InMemoryEndpointRepository(seed),
    results: new InMemoryProbeResultRepository(),
    notificationLogs: new InMemoryNotificationLogRepository(),
    connection: null,
  };
}

export async function createMonitorService(config: MonitorConfig): Promise<MonitorService> {
  const repositories = await createRepositories(config);

  const breakers = new CircuitBreakerRegistry();
  breakers.registerPreset(HEALTH_CHECK_BREAKER_PRESET, config.breaker);

  const transport = new AxiosHttpTransport({ maxSockets: config.probe.maxConcurrentChecks });
  const probe = new HealthProbe(transport, breakers, {
    deadlineBufferSeconds: config.probe.deadlineBufferSeconds,
    maxConcurrentChecks: config.probe.maxConcurrentChecks,
    useRetry: config.retry.enabled,
    retry: config.retry,
  });

  const webhook = config.notifications.webhook
    ? new WebhookNotificationChannel(config.notifications.webhook, breakers)
    : null;
  const channels: INotificationChannel[] = [new LogNotificationChannel(), ...(webhook ? [webhook] : [])];
  const notifier = new NotificationDispatcher(channels, repositories.notificationLogs);

  const cooldown = createCooldownGate({
    redisUrl: config.redisUrl,
    cooldownSeconds: config.notifications.cooldownSeconds,
  });
  const cooldownRevalidation =
    cooldown instanceof RedisCooldownGate
      ? new PeriodicTask({
          name: 'cooldown-revalidate',
          intervalMs: COOLDOWN_REVALIDATE_INTERVAL_MS,
          handler: async () => {
            if (cooldown.isDegraded()) await cooldown.revalidate();
          },
        })
      : null;

  const scheduler = new MonitoringScheduler(
    {
      endpoints: repositories.endpoints,
      results: repositories.results,
      probe,
      notifier,
      cooldown,
    },
    {
      notificationsEnabled: config.notifications.enabled,
      sendRecovery: config.notifications.sendRecovery,
    }
  );

  const aggregator = new UptimeAggregator(repositories.endpoints, repositories.results);
  const retention = new ResultRetentionScheduler(repositories.results, config.retention);
  const app = createApp({ breakers, scheduler, aggregator });

  return {
    breakers,
    scheduler,
    aggregator,
    retention,
    app,
    async start() {
      await scheduler.start();
      retention.start();
      cooldownRevalidation?.start();
    },
    async stop() {
      scheduler.stop();
      retention.stop();
      cooldownRevalidation?.cancel();
      transport.close();
      webhook?.close();
      if (cooldown instanceof RedisCooldownGate) {
        await cooldown.disconnect();
      }
      await repositories.connection?.close();
    },
  };
}
