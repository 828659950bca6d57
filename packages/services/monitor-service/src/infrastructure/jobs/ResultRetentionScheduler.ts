import { BaseScheduler, getLogger, type SchedulerExecutionResult } from '@beacon/platform-core';
import type { IProbeResultRepository } from '../../domains/monitoring/repositories/IProbeResultRepository';

export interface ResultRetentionConfig {
  checkHistoryDays: number;
  cronExpression: string;
  enabled?: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Deletes probe results older than the configured history window
 */
export class ResultRetentionScheduler extends BaseScheduler {
  constructor(
    private readonly results: IProbeResultRepository,
    private readonly retention: ResultRetentionConfig,
    private readonly now: () => Date = () => new Date()
  ) {
    super({ cronExpression: retention.cronExpression, enabled: retention.enabled ?? true, timeoutMs: 10 * 60 * 1000 });
    this.logger = getLogger('scheduler-result-retention');
  }

  get name(): string {
    return 'result-retention';
  }

  get serviceName(): string {
    return 'monitor-service';
  }

  protected async execute(): Promise<SchedulerExecutionResult> {
    const cutoff = new Date(this.now().getTime() - this.retention.checkHistoryDays * DAY_MS);
    const deleted = await this.results.deleteOlderThan(cutoff);

    if (deleted > 0) {
      this.logger.info('Pruned old probe results', { deleted, cutoff: cutoff.toISOString() });
    }
    return {
      success: true,
      message: `Deleted ${deleted} results older than ${cutoff.toISOString()}`,
      data: { deleted, cutoff: cutoff.toISOString() },
      durationMs: 0,
    };
  }
}
