/**
 * BaseScheduler - cron-driven job with shared start/stop/status logic
 */

import * as cron from 'node-cron';
import { getLogger, type Logger } from '../logging';
import { serializeError } from '../logging/error-serializer';
import type { SchedulerStatus, SchedulerInfo, SchedulerExecutionResult, SchedulerConfig } from './types';

export abstract class BaseScheduler {
  protected task: cron.ScheduledTask | null = null;
  protected logger: Logger;
  protected status: SchedulerStatus = 'stopped';

  protected lastRunAt: Date | null = null;
  protected lastRunDurationMs: number | null = null;
  protected lastRunSuccess: boolean | null = null;
  protected runCount = 0;
  protected errorCount = 0;

  protected config: SchedulerConfig;

  constructor(config: SchedulerConfig) {
    this.config = {
      enabled: true,
      runOnStart: false,
      timeoutMs: 300000,
      ...config,
    };
    this.logger = getLogger('scheduler');
  }

  abstract get name(): string;

  abstract get serviceName(): string;

  protected abstract execute(): Promise<SchedulerExecutionResult>;

  start(): void {
    if (this.task) {
      this.logger.warn(`[${this.name}] Already running, skipping start`);
      return;
    }

    if (!this.config.enabled) {
      this.logger.info(`[${this.name}] Disabled, not starting`);
      return;
    }

    if (!cron.validate(this.config.cronExpression)) {
      this.logger.error(`[${this.name}] Invalid cron expression: ${this.config.cronExpression}`);
      return;
    }

    this.task = cron.schedule(this.config.cronExpression, () => {
      void this.runWithErrorHandling();
    });
    this.status = 'running';

    this.logger.debug(`[${this.name}] Scheduler started`, { cronExpression: this.config.cronExpression });

    if (this.config.runOnStart) {
      void this.triggerNow();
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.debug(`[${this.name}] Already stopped`);
      return;
    }

    this.task.stop();
    this.task = null;
    this.status = 'stopped';
    this.logger.info(`[${this.name}] Scheduler stopped`);
  }

  async triggerNow(): Promise<SchedulerExecutionResult> {
    this.logger.info(`[${this.name}] Manual trigger requested`);
    return this.runWithErrorHandling();
  }

  /**
   * Never rejects; failures are logged and reported in the result
   */
  private async runWithErrorHandling(): Promise<SchedulerExecutionResult> {
    const startTime = Date.now();
    this.lastRunAt = new Date();
    this.runCount++;

    try {
      const result = await this.executeWithTimeout();
      this.lastRunDurationMs = Date.now() - startTime;
      this.lastRunSuccess = result.success;
      if (result.success) {
        this.logger.debug(`[${this.name}] Execution completed`, { durationMs: this.lastRunDurationMs, ...result.data });
      } else {
        this.logger.warn(`[${this.name}] Execution failed`, { message: result.message });
      }
      return { ...result, durationMs: this.lastRunDurationMs };
    } catch (error) {
      this.lastRunDurationMs = Date.now() - startTime;
      this.lastRunSuccess = false;
      this.errorCount++;
      this.logger.error(`[${this.name}] Execution error`, {
        error: serializeError(error),
        durationMs: this.lastRunDurationMs,
      });
      return {
        success: false,
        message: error instanceof Error ? error.message : String(error),
        durationMs: this.lastRunDurationMs,
      };
    }
  }

  private async executeWithTimeout(): Promise<SchedulerExecutionResult> {
    const timeoutMs = this.config.timeoutMs ?? 300000;
    let timer: ReturnType<typeof setTimeout> | undefined;

    try {
      return await Promise.race([
        this.execute(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error(`Execution timed out after ${timeoutMs}ms`)), timeoutMs);
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  getStatus(): SchedulerStatus {
    return this.status;
  }

  getInfo(): SchedulerInfo {
    return {
      name: this.name,
      cronExpression: this.config.cronExpression,
      status: this.status,
      lastRunAt: this.lastRunAt,
      lastRunDurationMs: this.lastRunDurationMs,
      lastRunSuccess: this.lastRunSuccess,
      runCount: this.runCount,
      errorCount: this.errorCount,
      serviceName: this.serviceName,
    };
  }
}
