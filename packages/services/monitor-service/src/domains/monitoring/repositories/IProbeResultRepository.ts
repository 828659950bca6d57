import type { ProbeResult, StoredProbeResult } from '../entities/ProbeResult';

export interface ProbeHistoryQuery {
  limit: number;
  offset: number;
  /** Inclusive bounds on checkedAt */
  from?: Date;
  to?: Date;
}

export interface ProbeHistoryPage {
  results: StoredProbeResult[];
  /** Matches before pagination */
  total: number;
}

export interface IProbeResultRepository {
  save(endpointId: string, result: ProbeResult): Promise<StoredProbeResult>;
  /** Results with checkedAt >= since, oldest first */
  findSince(endpointId: string, since: Date): Promise<StoredProbeResult[]>;
  findLatest(endpointId: string): Promise<StoredProbeResult | null>;
  /** Newest first */
  findHistory(endpointId: string, query: ProbeHistoryQuery): Promise<ProbeHistoryPage>;
  /** Returns the number of deleted rows */
  deleteOlderThan(cutoff: Date): Promise<number>;
}
