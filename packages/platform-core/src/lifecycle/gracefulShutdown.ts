import { createLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';

const logger = createLogger('graceful-shutdown');

type ShutdownHook = () => Promise<void>;

export type ShutdownPhase = 'drain' | 'schedulers' | 'connections';

const PHASE_ORDER: ShutdownPhase[] = ['drain', 'schedulers', 'connections'];

interface PhasedHook {
  phase: ShutdownPhase;
  hook: ShutdownHook;
  label?: string;
}

const phasedHooks: PhasedHook[] = [];
let isShuttingDown = false;

export function registerShutdownHook(phase: ShutdownPhase, hook: ShutdownHook, label?: string): void {
  phasedHooks.push({ phase, hook, label });
  logger.debug('Registered shutdown hook', { phase, label });
}

/**
 * Runs registered hooks phase by phase. A failing hook is logged and the rest still run.
 */
export async function runShutdownHooks(): Promise<void> {
  for (const phase of PHASE_ORDER) {
    const hooks = phasedHooks.filter(h => h.phase === phase);
    if (hooks.length === 0) continue;

    logger.info(`Executing shutdown phase: ${phase}`, { hookCount: hooks.length });
    for (const { hook, label } of hooks) {
      try {
        await hook();
        if (label) logger.debug(`Shutdown hook completed: ${label}`);
      } catch (error) {
        logger.error('Shutdown hook failed', { phase, label, error: serializeError(error) });
      }
    }
  }
}

export function setupGracefulShutdown(server?: { close: (callback: () => void) => void }, timeoutMs = 30000): void {
  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown (timeout: ${timeoutMs}ms)`);

    const timer = setTimeout(() => {
      logger.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, timeoutMs);
    timer.unref();

    if (server) {
      await new Promise<void>(resolve => server.close(() => resolve()));
      logger.info('HTTP server closed');
    }

    await runShutdownHooks();

    logger.info('Graceful shutdown complete');
    clearTimeout(timer);
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

export function isShutdownInProgress(): boolean {
  return isShuttingDown;
}
