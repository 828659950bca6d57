/**
 * MonitoringScheduler
 *
 * One PeriodicTask per active endpoint. Each tick re-reads the endpoint, probes
 * it, stores the result and raises failure/recovery notifications on state edges.
 */

import {
  PeriodicTask,
  generateCorrelationId,
  getLogger,
  runWithContext,
  serializeError,
} from '@beacon/platform-core';
import type { Endpoint } from '../../domains/monitoring/entities/Endpoint';
import type { ProbeResult } from '../../domains/monitoring/entities/ProbeResult';
import type { ICooldownGate } from '../../domains/monitoring/interfaces/ICooldownGate';
import type { IHealthProbe } from '../../domains/monitoring/interfaces/IHealthProbe';
import type { INotifier } from '../../domains/monitoring/interfaces/INotifier';
import type { IEndpointRepository } from '../../domains/monitoring/repositories/IEndpointRepository';
import type { IProbeResultRepository } from '../../domains/monitoring/repositories/IProbeResultRepository';

const logger = getLogger('monitoring-scheduler');

export interface MonitoringSchedulerDeps {
  endpoints: IEndpointRepository;
  results: IProbeResultRepository;
  probe: IHealthProbe;
  notifier: INotifier;
  cooldown: ICooldownGate;
}

export interface MonitoringSchedulerOptions {
  notificationsEnabled?: boolean;
  sendRecovery?: boolean;
}

export interface JobStatus {
  endpointId: string;
  endpointName: string;
  intervalSeconds: number;
  nextRunAt: Date | null;
  running: boolean;
}

interface MonitoringJob {
  endpoint: Endpoint;
  task: PeriodicTask;
}

export class MonitoringScheduler {
  private readonly jobs = new Map<string, MonitoringJob>();
  /** Last observed success per endpoint; absent until the first resolved check */
  private readonly lastState = new Map<string, boolean>();
  private readonly notificationsEnabled: boolean;
  private readonly sendRecovery: boolean;
  private started = false;

  constructor(
    private readonly deps: MonitoringSchedulerDeps,
    options: MonitoringSchedulerOptions = {}
  ) {
    this.notificationsEnabled = options.notificationsEnabled ?? true;
    this.sendRecovery = options.sendRecovery ?? true;
  }

  async start(): Promise<void> {
    if (this.started) {
      logger.warn('Monitoring scheduler already started');
      return;
    }
    this.started = true;

    const active = await this.deps.endpoints.findActive();
    for (const endpoint of active) {
      this.addJob(endpoint);
    }
    logger.info('Monitoring scheduler started', { jobs: this.jobs.size });
  }

  stop(): void {
    for (const job of this.jobs.values()) {
      job.task.cancel();
    }
    this.jobs.clear();
    this.started = false;
    logger.info('Monitoring scheduler stopped');
  }

  isStarted(): boolean {
    return this.started;
  }

  addJob(endpoint: Endpoint): void {
    if (this.jobs.has(endpoint.id)) {
      logger.warn('Job already exists for endpoint', { endpointId: endpoint.id });
      return;
    }

    const task = new PeriodicTask({
      name: `endpoint_${endpoint.id}`,
      intervalMs: endpoint.interval * 1000,
      handler: async () => {
        await this.checkEndpoint(endpoint.id);
      },
    });
    this.jobs.set(endpoint.id, { endpoint, task });
    task.start();

    logger.info('Added monitoring job', {
      endpointId: endpoint.id,
      endpointName: endpoint.name,
      intervalSeconds: endpoint.interval,
    });
  }

  /**
   * Cancels future ticks; a tick already running finishes on its own
   */
  removeJob(endpointId: string): void {
    const job = this.jobs.get(endpointId);
    if (!job) return;

    job.task.cancel();
    this.jobs.delete(endpointId);
    this.lastState.delete(endpointId);
    logger.info('Removed monitoring job', { endpointId });
  }

  updateJob(endpoint: Endpoint): void {
    this.removeJob(endpoint.id);
    if (endpoint.active) {
      this.addJob(endpoint);
    }
  }

  /**
   * Tick handler, also used for on-demand checks. Never rejects.
   */
  async checkEndpoint(endpointId: string): Promise<ProbeResult | null> {
    return runWithContext({ correlationId: generateCorrelationId(), endpointId }, async () => {
      try {
        const owner = this.jobs.get(endpointId);
        const endpoint = await this.deps.endpoints.findById(endpointId);
        if (!endpoint) {
          logger.warn('Endpoint no longer exists, removing job', { endpointId });
          this.removeJob(endpointId);
          return null;
        }
        if (!endpoint.active) {
          logger.debug('Endpoint inactive, skipping check', { endpointId });
          return null;
        }

        const result = await this.deps.probe.check(endpoint);
        await this.deps.results.save(endpoint.id, result);

        // The job may have been removed or replaced while the check was in flight
        if (this.jobs.get(endpointId) !== owner) {
          logger.debug('Job changed during check, leaving edge state alone', { endpointId });
          return result;
        }
        await this.handleStateChange(endpoint, result);

        return result;
      } catch (error) {
        logger.error('Endpoint check failed', { endpointId, error: serializeError(error) });
        return null;
      }
    });
  }

  getJobStatus(endpointId: string): JobStatus | null {
    const job = this.jobs.get(endpointId);
    if (!job) return null;
    return {
      endpointId,
      endpointName: job.endpoint.name,
      intervalSeconds: job.endpoint.interval,
      nextRunAt: job.task.getNextRunAt(),
      running: job.task.isRunning,
    };
  }

  getAllJobStatuses(): Record<string, JobStatus> {
    const statuses: Record<string, JobStatus> = {};
    for (const endpointId of this.jobs.keys()) {
      const status = this.getJobStatus(endpointId);
      if (status) statuses[endpointId] = status;
    }
    return statuses;
  }

  getLastState(endpointId: string): boolean | undefined {
    return this.lastState.get(endpointId);
  }

  private async handleStateChange(endpoint: Endpoint, result: ProbeResult): Promise<void> {
    const previous = this.lastState.get(endpoint.id);
    this.lastState.set(endpoint.id, result.success);

    if (!this.notificationsEnabled) return;

    if (!result.success && previous !== false) {
      if (await this.deps.cooldown.tryAcquire(endpoint.id)) {
        await this.dispatch('failure', endpoint, result);
      } else {
        logger.debug('Failure notification suppressed by cooldown', { endpointId: endpoint.id });
      }
    } else if (result.success && previous === false && this.sendRecovery) {
      await this.dispatch('recovery', endpoint, result);
    }
  }

  private async dispatch(kind: 'failure' | 'recovery', endpoint: Endpoint, result: ProbeResult): Promise<void> {
    try {
      if (kind === 'failure') {
        await this.deps.notifier.notifyFailure(endpoint, result);
      } else {
        await this.deps.notifier.notifyRecovery(endpoint, result);
      }
      logger.info(`Sent ${kind} notification`, { endpointId: endpoint.id, endpointName: endpoint.name });
    } catch (error) {
      logger.error(`Failed to send ${kind} notification`, {
        endpointId: endpoint.id,
        error: serializeError(error),
      });
    }
  }
}
