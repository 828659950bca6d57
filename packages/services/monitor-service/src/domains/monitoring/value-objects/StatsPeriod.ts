import { MonitorError } from '../../../application/errors';

const PERIOD_MS = {
  '24h': 24 * 60 * 60 * 1000,
  '7d': 7 * 24 * 60 * 60 * 1000,
  '30d': 30 * 24 * 60 * 60 * 1000,
} as const;

export type StatsPeriod = keyof typeof PERIOD_MS;

export const STATS_PERIODS = Object.keys(PERIOD_MS);

function isStatsPeriod(value: unknown): value is StatsPeriod {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(PERIOD_MS, value);
}

export function parseStatsPeriod(value: unknown): StatsPeriod {
  if (!isStatsPeriod(value)) {
    throw MonitorError.validationError('period', `must be one of ${STATS_PERIODS.join(', ')}`);
  }
  return value;
}

export function periodStart(period: StatsPeriod, now: Date): Date {
  return new Date(now.getTime() - PERIOD_MS[period]);
}
