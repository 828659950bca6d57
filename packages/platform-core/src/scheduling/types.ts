/**
 * Scheduler Types
 */

export type SchedulerStatus = 'stopped' | 'running';

export interface SchedulerInfo {
  name: string;
  cronExpression: string;
  status: SchedulerStatus;
  lastRunAt: Date | null;
  lastRunDurationMs: number | null;
  lastRunSuccess: boolean | null;
  runCount: number;
  errorCount: number;
  serviceName: string;
}

export interface SchedulerExecutionResult {
  success: boolean;
  message?: string;
  data?: Record<string, unknown>;
  durationMs: number;
}

export interface SchedulerConfig {
  cronExpression: string;
  enabled?: boolean;
  runOnStart?: boolean;
  timeoutMs?: number;
}

export interface PeriodicTaskOptions {
  name: string;
  intervalMs: number;
  handler: () => Promise<void>;
  /** Run the first tick right away instead of after one interval */
  runImmediately?: boolean;
}
