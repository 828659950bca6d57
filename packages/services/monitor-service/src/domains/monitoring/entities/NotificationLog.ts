export type NotificationKind = 'failure' | 'recovery';

export type NotificationStatus = 'sent' | 'failed';

export interface NotificationLog {
  id: string;
  endpointId: string;
  channel: string;
  kind: NotificationKind;
  status: NotificationStatus;
  message: string;
  errorMessage: string | null;
  sentAt: Date;
}

export type NewNotificationLog = Omit<NotificationLog, 'id'>;
