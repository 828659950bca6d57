import { randomUUID } from 'node:crypto';
import type { ProbeResult, StoredProbeResult } from '../../domains/monitoring/entities/ProbeResult';
import type {
  IProbeResultRepository,
  ProbeHistoryPage,
  ProbeHistoryQuery,
} from '../../domains/monitoring/repositories/IProbeResultRepository';

export class InMemoryProbeResultRepository implements IProbeResultRepository {
  private readonly byEndpoint = new Map<string, StoredProbeResult[]>();

  async save(endpointId: string, result: ProbeResult): Promise<StoredProbeResult> {
    const stored: StoredProbeResult = { ...result, id: randomUUID(), endpointId };
    const list = this.byEndpoint.get(endpointId) ?? [];
    list.push(stored);
    this.byEndpoint.set(endpointId, list);
    return stored;
  }

  async findSince(endpointId: string, since: Date): Promise<StoredProbeResult[]> {
    return (this.byEndpoint.get(endpointId) ?? [])
      .filter(result => result.checkedAt.getTime() >= since.getTime())
      .sort((a, b) => a.checkedAt.getTime() - b.checkedAt.getTime());
  }

  async findLatest(endpointId: string): Promise<StoredProbeResult | null> {
    const list = this.byEndpoint.get(endpointId) ?? [];
    return list.reduce<StoredProbeResult | null>(
      (latest, result) => (latest === null || result.checkedAt >= latest.checkedAt ? result : latest),
      null
    );
  }

  async findHistory(endpointId: string, query: ProbeHistoryQuery): Promise<ProbeHistoryPage> {
    const { from, to } = query;
    const matching = (this.byEndpoint.get(endpointId) ?? [])
      .filter(result => !from || result.checkedAt.getTime() >= from.getTime())
      .filter(result => !to || result.checkedAt.getTime() <= to.getTime())
      .sort((a, b) => b.checkedAt.getTime() - a.checkedAt.getTime());
    return {
      results: matching.slice(query.offset, query.offset + query.limit),
      total: matching.length,
    };
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    let deleted = 0;
    for (const [endpointId, list] of this.byEndpoint) {
      const kept = list.filter(result => result.checkedAt.getTime() >= cutoff.getTime());
      deleted += list.length - kept.length;
      this.byEndpoint.set(endpointId, kept);
    }
    return deleted;
  }
}
