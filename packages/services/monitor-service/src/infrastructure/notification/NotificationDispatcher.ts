import { errorMessage, getLogger } from '@beacon/platform-core';
import type { Endpoint } from '../../domains/monitoring/entities/Endpoint';
import type { NotificationKind } from '../../domains/monitoring/entities/NotificationLog';
import type { ProbeResult } from '../../domains/monitoring/entities/ProbeResult';
import type { INotifier } from '../../domains/monitoring/interfaces/INotifier';
import type { INotificationLogRepository } from '../../domains/monitoring/repositories/INotificationLogRepository';
import { buildNotificationMessage, type INotificationChannel, type NotificationMessage } from './NotificationMessage';

const logger = getLogger('notification-dispatcher');

/**
 * Fans each notification out to every channel and records one log entry per
 * channel. Delivery failures are logged, never thrown.
 */
export class NotificationDispatcher implements INotifier {
  constructor(
    private readonly channels: INotificationChannel[],
    private readonly logs: INotificationLogRepository
  ) {}

  async notifyFailure(endpoint: Endpoint, result: ProbeResult): Promise<void> {
    await this.deliver(buildNotificationMessage('failure', endpoint, result));
  }

  async notifyRecovery(endpoint: Endpoint, result: ProbeResult): Promise<void> {
    await this.deliver(buildNotificationMessage('recovery', endpoint, result));
  }

  private async deliver(message: NotificationMessage): Promise<void> {
    if (this.channels.length === 0) {
      logger.debug('No notification channels configured', { endpointId: message.endpointId });
      return;
    }
    await Promise.all(this.channels.map(channel => this.sendOne(channel, message)));
  }

  private async sendOne(channel: INotificationChannel, message: NotificationMessage): Promise<void> {
    let failure: string | null = null;
    try {
      await channel.send(message);
    } catch (error) {
      failure = errorMessage(error);
      logger.warn('Notification delivery failed', {
        channel: channel.name,
        endpointId: message.endpointId,
        kind: message.kind,
        error: failure,
      });
    }
    await this.record(channel.name, message.kind, message, failure);
  }

  private async record(
    channel: string,
    kind: NotificationKind,
    message: NotificationMessage,
    failure: string | null
  ): Promise<void> {
    try {
      await this.logs.save({
        endpointId: message.endpointId,
        channel,
        kind,
        status: failure === null ? 'sent' : 'failed',
        message: message.subject,
        errorMessage: failure,
        sentAt: new Date(),
      });
    } catch (error) {
      logger.error('Failed to record notification log', { channel, error: errorMessage(error) });
    }
  }
}
