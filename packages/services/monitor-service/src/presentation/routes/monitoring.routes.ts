import express from 'express';
import { asyncHandler, type CircuitBreakerRegistry } from '@beacon/platform-core';
import { MonitorError } from '../../application/errors';
import type { UptimeAggregator } from '../../domains/monitoring/services/UptimeAggregator';
import type { MonitoringScheduler } from '../../infrastructure/jobs/MonitoringScheduler';
import { sendSuccess } from '../utils/response-helpers';

export interface MonitoringRouteDeps {
  breakers: CircuitBreakerRegistry;
  scheduler: MonitoringScheduler;
  aggregator: UptimeAggregator;
}

function queryString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

function parseMinDuration(value: unknown): number {
  if (value === undefined) return 1;
  const parsed = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw MonitorError.validationError('minDuration', 'must be a non-negative number');
  }
  return parsed;
}

export function createMonitoringRouter({ breakers, scheduler, aggregator }: MonitoringRouteDeps): express.Router {
  const router: express.Router = express.Router();

  router.get('/breakers', (_req, res) => {
    sendSuccess(res, breakers.getAllStates());
  });

  router.post(
    '/breakers/:name/reset',
    asyncHandler(async (req, res) => {
      const reset = await breakers.reset(req.params.name);
      if (!reset) {
        throw MonitorError.notFound('Circuit breaker', req.params.name);
      }
      sendSuccess(res, breakers.getAllStates()[req.params.name]);
    })
  );

  router.get('/jobs', (_req, res) => {
    sendSuccess(res, scheduler.getAllJobStatuses());
  });

  router.get('/jobs/:endpointId', (req, res, next) => {
    const status = scheduler.getJobStatus(req.params.endpointId);
    if (!status) {
      next(MonitorError.notFound('Monitoring job', req.params.endpointId));
      return;
    }
    sendSuccess(res, status);
  });

  router.post(
    '/jobs/:endpointId/run',
    asyncHandler(async (req, res) => {
      const result = await scheduler.checkEndpoint(req.params.endpointId);
      if (!result) {
        throw MonitorError.notFound('Active endpoint', req.params.endpointId);
      }
      sendSuccess(res, result);
    })
  );

  router.get(
    '/endpoints/:endpointId/statistics',
    asyncHandler(async (req, res) => {
      const period = queryString(req.query.period, '24h');
      sendSuccess(res, await aggregator.statistics(req.params.endpointId, period));
    })
  );

  router.get(
    '/endpoints/:endpointId/incidents',
    asyncHandler(async (req, res) => {
      const period = queryString(req.query.period, '24h');
      const minDuration = parseMinDuration(req.query.minDuration);
      sendSuccess(res, await aggregator.incidents(req.params.endpointId, period, minDuration));
    })
  );

  router.get(
    '/endpoints/:endpointId/history',
    asyncHandler(async (req, res) => {
      sendSuccess(res, await aggregator.history(req.params.endpointId, req.query));
    })
  );

  router.get(
    '/summary',
    asyncHandler(async (_req, res) => {
      sendSuccess(res, await aggregator.overallSummary());
    })
  );

  return router;
}
