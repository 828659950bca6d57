import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import request from 'supertest';

vi.mock('@beacon/platform-core', async importOriginal => {
  const actual = await importOriginal<typeof import('@beacon/platform-core')>();
  const { mockLogger } = await import('./helpers/fixtures');
  return { ...actual, getLogger: () => mockLogger() };
});

import { CircuitBreakerRegistry } from '@beacon/platform-core';
import { createApp } from '../presentation/app';
import { MonitoringScheduler } from '../infrastructure/jobs/MonitoringScheduler';
import { UptimeAggregator } from '../domains/monitoring/services/UptimeAggregator';
import { InMemoryCooldownGate } from '../infrastructure/cooldown';
import { InMemoryEndpointRepository, InMemoryProbeResultRepository } from '../infrastructure/repositories';
import { successfulProbe } from '../domains/monitoring/entities/ProbeResult';
import { makeEndpoint, makeResult } from './helpers/fixtures';

const now = new Date('2026-03-01T12:00:00Z');

describe('monitoring routes', () => {
  let breakers: CircuitBreakerRegistry;
  let scheduler: MonitoringScheduler;
  let results: InMemoryProbeResultRepository;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    const endpoints = new InMemoryEndpointRepository([
      makeEndpoint(),
      makeEndpoint({ id: 'ep-2', name: 'paused', active: false }),
    ]);
    results = new InMemoryProbeResultRepository();
    breakers = new CircuitBreakerRegistry();
    scheduler = new MonitoringScheduler({
      endpoints,
      results,
      probe: { check: async () => successfulProbe(200, 25, now) },
      notifier: { notifyFailure: async () => undefined, notifyRecovery: async () => undefined },
      cooldown: new InMemoryCooldownGate(300),
    });
    const aggregator = new UptimeAggregator(endpoints, results, { now: () => now });
    app = createApp({ breakers, scheduler, aggregator });
  });

  afterEach(() => {
    scheduler.stop();
  });

  it('reports service health', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, data: { status: 'ok', schedulerRunning: false } });
  });

  describe('breakers', () => {
    it('lists breaker snapshots', async () => {
      breakers.get('health_check_api', { failureThreshold: 3 });

      const res = await request(app).get('/api/monitoring/breakers');

      expect(res.status).toBe(200);
      expect(res.body.data.health_check_api).toMatchObject({ state: 'closed', failureCount: 0, failureThreshold: 3 });
    });

    it('resets an open breaker', async () => {
      const breaker = breakers.get('health_check_api', { failureThreshold: 1 });
      await expect(breaker.call(() => Promise.reject(new Error('down')))).rejects.toThrow('down');
      expect(breaker.getState()).toBe('open');

      const res = await request(app).post('/api/monitoring/breakers/health_check_api/reset');

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ state: 'closed', failureCount: 0 });
    });

    it('returns 404 for an unknown breaker', async () => {
      const res = await request(app).post('/api/monitoring/breakers/nope/reset');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Circuit breaker not found: nope' },
      });
    });
  });

  describe('jobs', () => {
    it('lists scheduled jobs', async () => {
      await scheduler.start();

      const res = await request(app).get('/api/monitoring/jobs');

      expect(Object.keys(res.body.data)).toEqual(['ep-1']);
      expect(res.body.data['ep-1']).toMatchObject({ endpointName: 'api', intervalSeconds: 60, running: false });
    });

    it('returns 404 for an endpoint without a job', async () => {
      const res = await request(app).get('/api/monitoring/jobs/ep-2');

      expect(res.status).toBe(404);
      expect(res.body.error.message).toBe('Monitoring job not found: ep-2');
    });

    it('runs a check on demand', async () => {
      const res = await request(app).post('/api/monitoring/jobs/ep-1/run');

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({
        success: true,
        statusCode: 200,
        responseTimeMs: 25,
        errorCategory: null,
        errorMessage: null,
        checkedAt: '2026-03-01T12:00:00.000Z',
      });
      expect(await results.findLatest('ep-1')).not.toBeNull();
    });

    it('refuses to run an inactive endpoint', async () => {
      const res = await request(app).post('/api/monitoring/jobs/ep-2/run');

      expect(res.status).toBe(404);
      expect(res.body.error.message).toBe('Active endpoint not found: ep-2');
    });
  });

  describe('statistics', () => {
    beforeEach(async () => {
      await results.save('ep-1', makeResult(true, new Date('2026-03-01T11:00:00Z'), { responseTimeMs: 120 }));
      await results.save('ep-1', makeResult(false, new Date('2026-03-01T11:30:00Z')));
      await results.save('ep-1', makeResult(false, new Date('2026-03-01T11:32:00Z')));
    });

    it('defaults to the 24h period', async () => {
      const res = await request(app).get('/api/monitoring/endpoints/ep-1/statistics');

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({
        period: '24h',
        totalChecks: 3,
        uptimePercentage: 33.33,
        avgResponseTimeMs: 120,
        lastFailure: '2026-03-01T11:32:00.000Z',
      });
    });

    it('rejects an unsupported period', async () => {
      const res = await request(app).get('/api/monitoring/endpoints/ep-1/statistics?period=90d');

      expect(res.status).toBe(400);
      expect(res.body.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Validation failed for period: must be one of 24h, 7d, 30d',
      });
    });

    it('returns 404 for an unknown endpoint', async () => {
      const res = await request(app).get('/api/monitoring/endpoints/missing/statistics?period=7d');

      expect(res.status).toBe(404);
    });

    it('lists incidents', async () => {
      const res = await request(app).get('/api/monitoring/endpoints/ep-1/incidents?minDuration=2');

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual([
        {
          start: '2026-03-01T11:30:00.000Z',
          end: '2026-03-01T11:32:00.000Z',
          durationMinutes: 2,
          failureCount: 2,
          errors: ['Expected status 200, got 503'],
        },
      ]);
    });

    it('rejects a malformed minimum duration', async () => {
      const res = await request(app).get('/api/monitoring/endpoints/ep-1/incidents?minDuration=abc');

      expect(res.status).toBe(400);
    });
  });

  describe('history', () => {
    beforeEach(async () => {
      await results.save('ep-1', makeResult(true, new Date('2026-03-01T11:00:00Z')));
      await results.save('ep-1', makeResult(false, new Date('2026-03-01T11:30:00Z')));
      await results.save('ep-1', makeResult(false, new Date('2026-03-01T11:32:00Z')));
    });

    it('pages through checks newest first', async () => {
      const res = await request(app).get('/api/monitoring/endpoints/ep-1/history?limit=2');

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({
        endpointId: 'ep-1',
        endpointName: 'api',
        total: 3,
        limit: 2,
        offset: 0,
        from: null,
        to: null,
      });
      expect(res.body.data.checks.map((check: { checkedAt: string }) => check.checkedAt)).toEqual([
        '2026-03-01T11:32:00.000Z',
        '2026-03-01T11:30:00.000Z',
      ]);
    });

    it('filters by date range', async () => {
      const res = await request(app).get(
        '/api/monitoring/endpoints/ep-1/history?from=2026-03-01T11:15:00Z&to=2026-03-01T11:31:00Z'
      );

      expect(res.status).toBe(200);
      expect(res.body.data.total).toBe(1);
      expect(res.body.data.from).toBe('2026-03-01T11:15:00.000Z');
      expect(res.body.data.to).toBe('2026-03-01T11:31:00.000Z');
      expect(res.body.data.checks[0].checkedAt).toBe('2026-03-01T11:30:00.000Z');
    });

    it('rejects a limit above 1000', async () => {
      const res = await request(app).get('/api/monitoring/endpoints/ep-1/history?limit=5000');

      expect(res.status).toBe(400);
      expect(res.body.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Validation failed for limit: must be an integer between 1 and 1000',
      });
    });

    it('rejects a malformed date', async () => {
      const res = await request(app).get('/api/monitoring/endpoints/ep-1/history?from=yesterday');

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('Validation failed for from: must be an ISO 8601 date');
    });

    it('returns 404 for an unknown endpoint', async () => {
      const res = await request(app).get('/api/monitoring/endpoints/missing/history');

      expect(res.status).toBe(404);
      expect(res.body.error.message).toBe('Endpoint not found: missing');
    });
  });

  it('summarizes all endpoints', async () => {
    await results.save('ep-1', makeResult(true, new Date('2026-03-01T11:59:00Z')));

    const res = await request(app).get('/api/monitoring/summary');

    expect(res.body.data).toEqual({
      totalEndpoints: 2,
      activeEndpoints: 1,
      inactiveEndpoints: 1,
      healthyEndpoints: 1,
      unhealthyEndpoints: 0,
      timestamp: '2026-03-01T12:00:00.000Z',
    });
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get('/api/monitoring/nothing');

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe('NOT_FOUND');
  });
});
