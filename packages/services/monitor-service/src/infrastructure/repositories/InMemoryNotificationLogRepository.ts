import { randomUUID } from 'node:crypto';
import type { NewNotificationLog, NotificationLog } from '../../domains/monitoring/entities/NotificationLog';
import type { INotificationLogRepository } from '../../domains/monitoring/repositories/INotificationLogRepository';

export class InMemoryNotificationLogRepository implements INotificationLogRepository {
  private readonly logs: NotificationLog[] = [];

  async save(log: NewNotificationLog): Promise<NotificationLog> {
    const saved = { ...log, id: randomUUID() };
    this.logs.push(saved);
    return saved;
  }

  async findByEndpoint(endpointId: string, limit = 50): Promise<NotificationLog[]> {
    return this.logs
      .filter(log => log.endpointId === endpointId)
      .sort((a, b) => b.sentAt.getTime() - a.sentAt.getTime())
      .slice(0, limit);
  }
}
