import { getLogger } from '@beacon/platform-core';
import { MonitorError } from '../../../application/errors';
import type { Endpoint } from '../entities/Endpoint';
import type { StoredProbeResult } from '../entities/ProbeResult';
import type { IEndpointRepository } from '../repositories/IEndpointRepository';
import type { IProbeResultRepository } from '../repositories/IProbeResultRepository';
import { parseHistoryQuery } from '../value-objects/HistoryQuery';
import { parseStatsPeriod, periodStart, type StatsPeriod } from '../value-objects/StatsPeriod';
import { groupIncidents, type DowntimeIncident } from './incidents';

const logger = getLogger('uptime-aggregator');

export interface EndpointStatistics {
  endpointId: string;
  endpointName: string;
  period: StatsPeriod;
  uptimePercentage: number;
  totalChecks: number;
  successfulChecks: number;
  failedChecks: number;
  avgResponseTimeMs: number | null;
  minResponseTimeMs: number | null;
  maxResponseTimeMs: number | null;
  lastCheck: Date | null;
  lastSuccess: Date | null;
  lastFailure: Date | null;
}

export interface CheckHistory {
  endpointId: string;
  endpointName: string;
  checks: StoredProbeResult[];
  total: number;
  limit: number;
  offset: number;
  from: Date | null;
  to: Date | null;
}

export interface OverallSummary {
  totalEndpoints: number;
  activeEndpoints: number;
  inactiveEndpoints: number;
  healthyEndpoints: number;
  unhealthyEndpoints: number;
  timestamp: string;
}

const round2 = (value: number) => Math.round(value * 100) / 100;

function latestAt(results: StoredProbeResult[]): Date | null {
  return results.reduce<Date | null>(
    (latest, result) => (latest === null || result.checkedAt > latest ? result.checkedAt : latest),
    null
  );
}

interface ResponseTimeSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
}

/**
 * Single pass over the samples; a 30-day window can hold hundreds of thousands
 */
function summarizeResponseTimes(results: StoredProbeResult[]): ResponseTimeSummary | null {
  let summary: ResponseTimeSummary | null = null;
  for (const { responseTimeMs } of results) {
    if (responseTimeMs === null) continue;
    if (summary === null) {
      summary = { count: 1, sum: responseTimeMs, min: responseTimeMs, max: responseTimeMs };
    } else {
      summary.count++;
      summary.sum += responseTimeMs;
      if (responseTimeMs < summary.min) summary.min = responseTimeMs;
      if (responseTimeMs > summary.max) summary.max = responseTimeMs;
    }
  }
  return summary;
}

export class UptimeAggregator {
  private readonly now: () => Date;

  constructor(
    private readonly endpoints: IEndpointRepository,
    private readonly results: IProbeResultRepository,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async statistics(endpointId: string, period: unknown): Promise<EndpointStatistics> {
    const window = parseStatsPeriod(period);
    const endpoint = await this.requireEndpoint(endpointId);
    const results = await this.results.findSince(endpointId, periodStart(window, this.now()));

    const successful = results.filter(r => r.success);
    const failed = results.filter(r => !r.success);
    const timing = summarizeResponseTimes(results);

    const stats: EndpointStatistics = {
      endpointId,
      endpointName: endpoint.name,
      period: window,
      uptimePercentage: results.length === 0 ? 0 : round2((successful.length / results.length) * 100),
      totalChecks: results.length,
      successfulChecks: successful.length,
      failedChecks: failed.length,
      avgResponseTimeMs: timing ? round2(timing.sum / timing.count) : null,
      minResponseTimeMs: timing ? round2(timing.min) : null,
      maxResponseTimeMs: timing ? round2(timing.max) : null,
      lastCheck: latestAt(results),
      lastSuccess: latestAt(successful),
      lastFailure: latestAt(failed),
    };

    logger.debug('Calculated endpoint statistics', {
      endpointId,
      period: window,
      uptimePercentage: stats.uptimePercentage,
      totalChecks: stats.totalChecks,
    });
    return stats;
  }

  async uptimePercentage(endpointId: string, period: unknown): Promise<number> {
    return (await this.statistics(endpointId, period)).uptimePercentage;
  }

  async incidents(endpointId: string, period: unknown, minDurationMinutes = 1): Promise<DowntimeIncident[]> {
    const window = parseStatsPeriod(period);
    if (!Number.isFinite(minDurationMinutes) || minDurationMinutes < 0) {
      throw MonitorError.validationError('minDuration', 'must be a non-negative number');
    }
    await this.requireEndpoint(endpointId);

    const results = await this.results.findSince(endpointId, periodStart(window, this.now()));
    return groupIncidents(results, { minDurationMinutes });
  }

  async history(endpointId: string, rawQuery: Record<string, unknown>): Promise<CheckHistory> {
    const query = parseHistoryQuery(rawQuery);
    const endpoint = await this.requireEndpoint(endpointId);
    const page = await this.results.findHistory(endpointId, query);

    logger.info('Retrieved check history', { endpointId, count: page.results.length, total: page.total });
    return {
      endpointId,
      endpointName: endpoint.name,
      checks: page.results,
      total: page.total,
      limit: query.limit,
      offset: query.offset,
      from: query.from ?? null,
      to: query.to ?? null,
    };
  }

  /**
   * Health counts cover active endpoints only; an endpoint with no results is unhealthy
   */
  async overallSummary(): Promise<OverallSummary> {
    const all = await this.endpoints.findAll();
    const active = all.filter(endpoint => endpoint.active);

    const latest = await Promise.all(active.map(endpoint => this.results.findLatest(endpoint.id)));
    const healthy = latest.filter(result => result?.success === true).length;

    const summary: OverallSummary = {
      totalEndpoints: all.length,
      activeEndpoints: active.length,
      inactiveEndpoints: all.length - active.length,
      healthyEndpoints: healthy,
      unhealthyEndpoints: active.length - healthy,
      timestamp: this.now().toISOString(),
    };
    logger.debug('Generated overall summary', { ...summary });
    return summary;
  }

  private async requireEndpoint(endpointId: string): Promise<Endpoint> {
    const endpoint = await this.endpoints.findById(endpointId);
    if (!endpoint) {
      throw MonitorError.notFound('Endpoint', endpointId);
    }
    return endpoint;
  }
}
