import type { ICooldownGate } from '../../domains/monitoring/interfaces/ICooldownGate';

/**
 * Process-local cooldown map. Also serves as the fallback of the Redis gate.
 */
export class InMemoryCooldownGate implements ICooldownGate {
  private readonly expiresAt = new Map<string, number>();

  constructor(
    private readonly cooldownSeconds: number,
    private readonly now: () => number = Date.now
  ) {}

  async tryAcquire(endpointId: string): Promise<boolean> {
    const current = this.now();
    const expiry = this.expiresAt.get(endpointId);
    if (expiry !== undefined && expiry > current) {
      return false;
    }
    this.expiresAt.set(endpointId, current + this.cooldownSeconds * 1000);
    return true;
  }

  /** Records a send without checking the window */
  mark(endpointId: string): void {
    this.expiresAt.set(endpointId, this.now() + this.cooldownSeconds * 1000);
  }

  reset(endpointId: string): void {
    this.expiresAt.delete(endpointId);
  }

  clear(): void {
    this.expiresAt.clear();
  }
}
