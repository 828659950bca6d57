import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@beacon/platform-core', async importOriginal => {
  const actual = await importOriginal<typeof import('@beacon/platform-core')>();
  const { mockLogger } = await import('./helpers/fixtures');
  return { ...actual, getLogger: () => mockLogger() };
});

import { NotificationDispatcher } from '../infrastructure/notification/NotificationDispatcher';
import { buildNotificationMessage, type NotificationMessage } from '../infrastructure/notification/NotificationMessage';
import { LogNotificationChannel } from '../infrastructure/notification/LogNotificationChannel';
import { InMemoryNotificationLogRepository } from '../infrastructure/repositories';
import { failedProbe, successfulProbe } from '../domains/monitoring/entities/ProbeResult';
import { makeEndpoint } from './helpers/fixtures';

const checkedAt = new Date('2026-03-01T12:00:00Z');

function channel(name: string, failWith?: Error) {
  return {
    name,
    send: vi.fn(async (_message: NotificationMessage) => {
      if (failWith) throw failWith;
    }),
  };
}

describe('buildNotificationMessage', () => {
  it('describes a failure', () => {
    const result = failedProbe('Timeout', 'Request timed out: 5000ms', { checkedAt });

    const message = buildNotificationMessage('failure', makeEndpoint(), result);

    expect(message).toEqual({
      kind: 'failure',
      endpointId: 'ep-1',
      endpointName: 'api',
      url: 'http://status.example.test/health',
      subject: 'Alert: api is DOWN',
      body: 'Endpoint api is unreachable. Error: Request timed out: 5000ms',
      error: 'Request timed out: 5000ms',
      statusCode: null,
      timestamp: '2026-03-01T12:00:00.000Z',
    });
  });

  it('describes a recovery', () => {
    const message = buildNotificationMessage('recovery', makeEndpoint(), successfulProbe(200, 80, checkedAt));

    expect(message.subject).toBe('Recovery: api is back online');
    expect(message.body).toBe(
      'api is back online!\nURL: http://status.example.test/health\nRecovered at: 2026-03-01T12:00:00.000Z'
    );
  });
});

describe('NotificationDispatcher', () => {
  let logs: InMemoryNotificationLogRepository;

  beforeEach(() => {
    logs = new InMemoryNotificationLogRepository();
  });

  it('sends to every channel and logs each delivery', async () => {
    const email = channel('email');
    const webhook = channel('webhook');
    const dispatcher = new NotificationDispatcher([email, webhook], logs);

    await dispatcher.notifyFailure(makeEndpoint(), failedProbe('ConnectionError', 'Connection error: refused'));

    expect(email.send).toHaveBeenCalledTimes(1);
    expect(webhook.send.mock.calls[0][0].subject).toBe('Alert: api is DOWN');
    const saved = await logs.findByEndpoint('ep-1');
    expect(saved.map(log => [log.channel, log.kind, log.status]).sort()).toEqual([
      ['email', 'failure', 'sent'],
      ['webhook', 'failure', 'sent'],
    ]);
  });

  it('records a failed channel without affecting the others', async () => {
    const broken = channel('webhook', new Error('Failed after 3 attempts: Request failed with status code 500'));
    const log = channel('log');
    const dispatcher = new NotificationDispatcher([broken, log], logs);

    await expect(dispatcher.notifyRecovery(makeEndpoint(), successfulProbe(200, 10))).resolves.toBeUndefined();

    expect(log.send).toHaveBeenCalledTimes(1);
    const saved = await logs.findByEndpoint('ep-1');
    const failed = saved.find(entry => entry.channel === 'webhook');
    expect(failed).toMatchObject({
      kind: 'recovery',
      status: 'failed',
      message: 'Recovery: api is back online',
      errorMessage: 'Failed after 3 attempts: Request failed with status code 500',
    });
  });

  it('does nothing without channels', async () => {
    const dispatcher = new NotificationDispatcher([], logs);

    await dispatcher.notifyFailure(makeEndpoint(), failedProbe('Timeout', 'slow'));

    expect(await logs.findByEndpoint('ep-1')).toEqual([]);
  });

  it('survives a log store failure', async () => {
    vi.spyOn(logs, 'save').mockRejectedValueOnce(new Error('db offline'));
    const dispatcher = new NotificationDispatcher([channel('log')], logs);

    await expect(dispatcher.notifyFailure(makeEndpoint(), failedProbe('Timeout', 'slow'))).resolves.toBeUndefined();
  });

  it('writes to the service log through the log channel', async () => {
    const dispatcher = new NotificationDispatcher([new LogNotificationChannel()], logs);

    await dispatcher.notifyFailure(makeEndpoint(), failedProbe('Timeout', 'slow'));

    expect((await logs.findByEndpoint('ep-1'))[0]).toMatchObject({ channel: 'log', status: 'sent' });
  });
});
