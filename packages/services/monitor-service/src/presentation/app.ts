import express from 'express';
import { errorHandler, notFoundHandler } from '@beacon/platform-core';
import { createMonitoringRouter, type MonitoringRouteDeps } from './routes/monitoring.routes';
import { sendSuccess } from './utils/response-helpers';

export function createApp(deps: MonitoringRouteDeps): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json());

  app.get('/health', (_req, res) => {
    sendSuccess(res, { status: 'ok', schedulerRunning: deps.scheduler.isStarted() });
  });

  app.use('/api/monitoring', createMonitoringRouter(deps));

  app.use(notFoundHandler());
  app.use(errorHandler());
  return app;
}
