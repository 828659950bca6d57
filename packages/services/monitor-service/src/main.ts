import { getLogger, registerShutdownHook, serializeError, setupGracefulShutdown } from '@beacon/platform-core';
import { loadMonitorConfig } from './config/monitor-config';
import { createMonitorService } from './infrastructure/MonitorServiceContainer';

const logger = getLogger('monitor-service');

async function main(): Promise<void> {
  const config = loadMonitorConfig();
  const service = await createMonitorService(config);

  await service.start();
  const server = service.app.listen(config.port, () => {
    logger.info('Monitor service listening', { port: config.port });
  });

  registerShutdownHook('schedulers', () => service.stop(), 'monitor-service');
  setupGracefulShutdown(server);
}

main().catch(error => {
  logger.error('Monitor service failed to start', { error: serializeError(error) });
  process.exit(1);
});
