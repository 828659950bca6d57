import type { Endpoint } from '../../domains/monitoring/entities/Endpoint';
import type { IEndpointRepository } from '../../domains/monitoring/repositories/IEndpointRepository';

export class InMemoryEndpointRepository implements IEndpointRepository {
  private readonly endpoints = new Map<string, Endpoint>();

  constructor(initial: Endpoint[] = []) {
    for (const endpoint of initial) {
      this.endpoints.set(endpoint.id, endpoint);
    }
  }

  async findById(id: string): Promise<Endpoint | null> {
    return this.endpoints.get(id) ?? null;
  }

  async findActive(): Promise<Endpoint[]> {
    return [...this.endpoints.values()].filter(endpoint => endpoint.active);
  }

  async findAll(): Promise<Endpoint[]> {
    return [...this.endpoints.values()];
  }

  upsert(endpoint: Endpoint): void {
    this.endpoints.set(endpoint.id, endpoint);
  }

  remove(id: string): boolean {
    return this.endpoints.delete(id);
  }
}
