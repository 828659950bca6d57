import Redis from 'ioredis';
import { errorMessage, getLogger } from '@beacon/platform-core';
import type { ICooldownGate } from '../../domains/monitoring/interfaces/ICooldownGate';
import { InMemoryCooldownGate } from './InMemoryCooldownGate';

const logger = getLogger('redis-cooldown-gate');

export interface RedisCooldownGateConfig {
  redisUrl: string;
  cooldownSeconds: number;
  keyPrefix?: string;
}

/**
 * Cooldown backed by `SET key value EX ttl NX`, so a key's existence is the window.
 *
 * Fails open: on a Redis error the send is allowed, the gate switches to its
 * in-process fallback, and stays there until revalidate() succeeds.
 */
export class RedisCooldownGate implements ICooldownGate {
  private readonly redis: Redis;
  private readonly keyPrefix: string;
  private degraded = false;

  constructor(
    private readonly config: RedisCooldownGateConfig,
    private readonly fallback: InMemoryCooldownGate = new InMemoryCooldownGate(config.cooldownSeconds)
  ) {
    this.keyPrefix = config.keyPrefix ?? 'cooldown:endpoint:';
    this.redis = new Redis(config.redisUrl, {
      maxRetriesPerRequest: 1,
      enableReadyCheck: false,
      lazyConnect: true,
    });
    this.redis.on('error', (err: Error) => {
      logger.warn('Redis cooldown connection error', { error: err.message });
    });
  }

  async tryAcquire(endpointId: string): Promise<boolean> {
    if (this.degraded) {
      return this.fallback.tryAcquire(endpointId);
    }

    try {
      const result = await this.redis.set(
        `${this.keyPrefix}${endpointId}`,
        new Date().toISOString(),
        'EX',
        this.config.cooldownSeconds,
        'NX'
      );
      return result === 'OK';
    } catch (error) {
      logger.warn('Cooldown store unavailable, allowing notification and using in-process fallback', {
        endpointId,
        error: errorMessage(error),
      });
      this.degraded = true;
      this.fallback.mark(endpointId);
      return true;
    }
  }

  isDegraded(): boolean {
    return this.degraded;
  }

  /**
   * Pings Redis and leaves fallback mode when it answers
   */
  async revalidate(): Promise<boolean> {
    try {
      await this.redis.ping();
      if (this.degraded) {
        logger.info('Cooldown store reachable again, leaving fallback mode');
      }
      this.degraded = false;
      return true;
    } catch (error) {
      logger.warn('Cooldown store still unavailable', { error: errorMessage(error) });
      this.degraded = true;
      return false;
    }
  }

  async disconnect(): Promise<void> {
    await this.redis.quit();
  }
}
