import type { NotificationKind } from '../../domains/monitoring/entities/NotificationLog';
import type { Endpoint } from '../../domains/monitoring/entities/Endpoint';
import type { ProbeResult } from '../../domains/monitoring/entities/ProbeResult';

export interface NotificationMessage {
  kind: NotificationKind;
  endpointId: string;
  endpointName: string;
  url: string;
  subject: string;
  body: string;
  error: string | null;
  statusCode: number | null;
  timestamp: string;
}

export interface INotificationChannel {
  readonly name: string;
  send(message: NotificationMessage): Promise<void>;
}

export function buildNotificationMessage(
  kind: NotificationKind,
  endpoint: Endpoint,
  result: ProbeResult
): NotificationMessage {
  const timestamp = result.checkedAt.toISOString();
  const error = result.errorMessage;

  const subject =
    kind === 'failure' ? `Alert: ${endpoint.name} is DOWN` : `Recovery: ${endpoint.name} is back online`;
  const body =
    kind === 'failure'
      ? `Endpoint ${endpoint.name} is unreachable. Error: ${error ?? 'unknown'}`
      : `${endpoint.name} is back online!\nURL: ${endpoint.url}\nRecovered at: ${timestamp}`;

  return {
    kind,
    endpointId: endpoint.id,
    endpointName: endpoint.name,
    url: endpoint.url,
    subject,
    body,
    error,
    statusCode: result.statusCode,
    timestamp,
  };
}
