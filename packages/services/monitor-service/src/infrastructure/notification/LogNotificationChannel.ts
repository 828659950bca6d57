import { getLogger } from '@beacon/platform-core';
import type { INotificationChannel, NotificationMessage } from './NotificationMessage';

const logger = getLogger('notifications');

/**
 * Writes notifications to the service log
 */
export class LogNotificationChannel implements INotificationChannel {
  readonly name = 'log';

  async send(message: NotificationMessage): Promise<void> {
    const meta = { endpointId: message.endpointId, error: message.error, statusCode: message.statusCode };
    if (message.kind === 'failure') {
      logger.warn(message.subject, meta);
    } else {
      logger.info(message.subject, meta);
    }
  }
}
