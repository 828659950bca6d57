/**
 * PeriodicTask - fixed-interval loop with a cancellation handle.
 *
 * The next tick is armed only after the previous one settles, so a slow
 * handler delays the schedule instead of producing overlapping runs.
 */

import { getLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';
import type { PeriodicTaskOptions } from './types';

const logger = getLogger('periodic-task');

export class PeriodicTask {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private nextRunAt: Date | null = null;
  private started = false;
  private cancelled = false;
  private running = false;
  private runCount = 0;

  constructor(private readonly options: PeriodicTaskOptions) {
    if (!(options.intervalMs > 0)) {
      throw new RangeError(`Invalid interval for task ${options.name}: ${options.intervalMs}`);
    }
  }

  get name(): string {
    return this.options.name;
  }

  get intervalMs(): number {
    return this.options.intervalMs;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get completedRuns(): number {
    return this.runCount;
  }

  getNextRunAt(): Date | null {
    return this.nextRunAt;
  }

  start(): void {
    if (this.started || this.cancelled) return;
    this.started = true;
    this.arm(this.options.runImmediately ? 0 : this.options.intervalMs);
  }

  /**
   * Stops future ticks. A tick already in progress is left to finish. Idempotent.
   */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRunAt = null;
  }

  private arm(delayMs: number): void {
    this.nextRunAt = new Date(Date.now() + delayMs);
    this.timer = setTimeout(() => {
      void this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    this.timer = null;
    this.nextRunAt = null;
    if (this.cancelled) return;

    this.running = true;
    try {
      await this.options.handler();
    } catch (error) {
      logger.error(`[${this.options.name}] Tick failed`, { error: serializeError(error) });
    } finally {
      this.running = false;
      this.runCount++;
    }

    if (!this.cancelled) {
      this.arm(this.options.intervalMs);
    }
  }
}
