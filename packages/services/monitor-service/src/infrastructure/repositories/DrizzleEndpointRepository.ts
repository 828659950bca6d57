import { eq } from 'drizzle-orm';
import { z } from 'zod';
import type { Endpoint } from '../../domains/monitoring/entities/Endpoint';
import type { IEndpointRepository } from '../../domains/monitoring/repositories/IEndpointRepository';
import { endpoints, type EndpointRow } from '../../schema/monitor-schema';
import type { MonitorDatabase } from '../database/DatabaseConnectionFactory';

function toEndpoint(row: EndpointRow): Endpoint {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    method: row.method,
    interval: row.interval,
    timeout: row.timeout,
    expectedStatus: row.expectedStatus,
    headers: row.headers,
    body: row.body ?? undefined,
    active: row.isActive,
  };
}

const endpointIdSchema = z.string().uuid();

export class DrizzleEndpointRepository implements IEndpointRepository {
  constructor(private readonly db: MonitorDatabase) {}

  /**
   * Ids are uuid columns; anything else cannot match and is not sent to Postgres
   */
  async findById(id: string): Promise<Endpoint | null> {
    if (!endpointIdSchema.safeParse(id).success) return null;
    const [row] = await this.db.select().from(endpoints).where(eq(endpoints.id, id)).limit(1);
    return row ? toEndpoint(row) : null;
  }

  async findActive(): Promise<Endpoint[]> {
    const rows = await this.db.select().from(endpoints).where(eq(endpoints.isActive, true));
    return rows.map(toEndpoint);
  }

  async findAll(): Promise<Endpoint[]> {
    const rows = await this.db.select().from(endpoints);
    return rows.map(toEndpoint);
  }
}
