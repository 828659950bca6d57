import type { Endpoint } from '../entities/Endpoint';

/**
 * Read-only view of endpoint definitions. Endpoint management lives elsewhere.
 */
export interface IEndpointRepository {
  findById(id: string): Promise<Endpoint | null>;
  findActive(): Promise<Endpoint[]>;
  findAll(): Promise<Endpoint[]>;
}
