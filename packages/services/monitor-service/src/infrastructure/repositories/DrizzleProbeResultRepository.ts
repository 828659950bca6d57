import { and, asc, count, desc, eq, gte, lt, lte } from 'drizzle-orm';
import type { ProbeResult, StoredProbeResult } from '../../domains/monitoring/entities/ProbeResult';
import type {
  IProbeResultRepository,
  ProbeHistoryPage,
  ProbeHistoryQuery,
} from '../../domains/monitoring/repositories/IProbeResultRepository';
import { probeResults, type ProbeResultRow } from '../../schema/monitor-schema';
import type { MonitorDatabase } from '../database/DatabaseConnectionFactory';

function toStored(row: ProbeResultRow): StoredProbeResult {
  return {
    id: row.id,
    endpointId: row.endpointId,
    success: row.success,
    statusCode: row.statusCode,
    responseTimeMs: row.responseTimeMs,
    errorCategory: row.errorCategory,
    errorMessage: row.errorMessage,
    checkedAt: row.checkedAt,
  };
}

export class DrizzleProbeResultRepository implements IProbeResultRepository {
  constructor(private readonly db: MonitorDatabase) {}

  async save(endpointId: string, result: ProbeResult): Promise<StoredProbeResult> {
    const [row] = await this.db
      .insert(probeResults)
      .values({
        endpointId,
        success: result.success,
        statusCode: result.statusCode,
        responseTimeMs: result.responseTimeMs,
        errorCategory: result.errorCategory,
        errorMessage: result.errorMessage,
        checkedAt: result.checkedAt,
      })
      .returning();
    return toStored(row);
  }

  async findSince(endpointId: string, since: Date): Promise<StoredProbeResult[]> {
    const rows = await this.db
      .select()
      .from(probeResults)
      .where(and(eq(probeResults.endpointId, endpointId), gte(probeResults.checkedAt, since)))
      .orderBy(asc(probeResults.checkedAt));
    return rows.map(toStored);
  }

  async findLatest(endpointId: string): Promise<StoredProbeResult | null> {
    const [row] = await this.db
      .select()
      .from(probeResults)
      .where(eq(probeResults.endpointId, endpointId))
      .orderBy(desc(probeResults.checkedAt))
      .limit(1);
    return row ? toStored(row) : null;
  }

  async findHistory(endpointId: string, query: ProbeHistoryQuery): Promise<ProbeHistoryPage> {
    const where = and(
      eq(probeResults.endpointId, endpointId),
      query.from ? gte(probeResults.checkedAt, query.from) : undefined,
      query.to ? lte(probeResults.checkedAt, query.to) : undefined
    );

    const [counted] = await this.db.select({ total: count() }).from(probeResults).where(where);
    const rows = await this.db
      .select()
      .from(probeResults)
      .where(where)
      .orderBy(desc(probeResults.checkedAt))
      .limit(query.limit)
      .offset(query.offset);

    return { results: rows.map(toStored), total: counted?.total ?? 0 };
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const deleted = await this.db
      .delete(probeResults)
      .where(lt(probeResults.checkedAt, cutoff))
      .returning({ id: probeResults.id });
    return deleted.length;
  }
}
