import { InMemoryCooldownGate } from './InMemoryCooldownGate';
import { RedisCooldownGate } from './RedisCooldownGate';

export { InMemoryCooldownGate, RedisCooldownGate };

export function createCooldownGate(config: {
  redisUrl?: string;
  cooldownSeconds: number;
}): InMemoryCooldownGate | RedisCooldownGate {
  if (config.redisUrl) {
    return new RedisCooldownGate({ redisUrl: config.redisUrl, cooldownSeconds: config.cooldownSeconds });
  }
  return new InMemoryCooldownGate(config.cooldownSeconds);
}
