import type { Endpoint } from '../entities/Endpoint';
import type { ProbeResult } from '../entities/ProbeResult';

export interface IHealthProbe {
  /** Never rejects; failures come back as unsuccessful results */
  check(endpoint: Endpoint): Promise<ProbeResult>;
}
