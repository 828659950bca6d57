import type { Endpoint } from '../entities/Endpoint';
import type { ProbeResult } from '../entities/ProbeResult';

export interface INotifier {
  notifyFailure(endpoint: Endpoint, result: ProbeResult): Promise<void>;
  notifyRecovery(endpoint: Endpoint, result: ProbeResult): Promise<void>;
}
