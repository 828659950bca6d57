import type { NewNotificationLog, NotificationLog } from '../entities/NotificationLog';

export interface INotificationLogRepository {
  save(log: NewNotificationLog): Promise<NotificationLog>;
  findByEndpoint(endpointId: string, limit?: number): Promise<NotificationLog[]>;
}
