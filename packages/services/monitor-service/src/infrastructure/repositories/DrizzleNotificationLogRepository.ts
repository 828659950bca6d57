import { desc, eq } from 'drizzle-orm';
import type { NewNotificationLog, NotificationLog } from '../../domains/monitoring/entities/NotificationLog';
import type { INotificationLogRepository } from '../../domains/monitoring/repositories/INotificationLogRepository';
import { notificationLogs } from '../../schema/monitor-schema';
import type { MonitorDatabase } from '../database/DatabaseConnectionFactory';

export class DrizzleNotificationLogRepository implements INotificationLogRepository {
  constructor(private readonly db: MonitorDatabase) {}

  async save(log: NewNotificationLog): Promise<NotificationLog> {
    const [row] = await this.db.insert(notificationLogs).values(log).returning();
    return row;
  }

  async findByEndpoint(endpointId: string, limit = 50): Promise<NotificationLog[]> {
    return this.db
      .select()
      .from(notificationLogs)
      .where(eq(notificationLogs.endpointId, endpointId))
      .orderBy(desc(notificationLogs.sentAt))
      .limit(limit);
  }
}
