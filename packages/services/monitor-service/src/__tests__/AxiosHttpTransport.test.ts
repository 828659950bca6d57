import { describe, it, expect, afterEach, beforeAll, afterAll } from 'vitest';
import { AxiosError } from 'axios';
import { runWithContext } from '@beacon/platform-core';
import { AxiosHttpTransport, classifyTransportError } from '../infrastructure/http/AxiosHttpTransport';
import { ProbeFailure } from '../application/errors';
import { startTestServer, unusedUrl, type TestServer } from './helpers/httpServer';

describe('AxiosHttpTransport', () => {
  let server: TestServer;
  let transport: AxiosHttpTransport;

  beforeAll(async () => {
    server = await startTestServer((req, res) => {
      if (req.url === '/hang') return;
      const status = req.url === '/unavailable' ? 503 : 200;
      res.writeHead(status, { 'content-type': 'text/plain' });
      res.end('ok');
    });
  });

  afterAll(async () => {
    await server.close();
  });

  afterEach(() => {
    server.requests.length = 0;
    transport.close();
  });

  it('returns the status and a response time', async () => {
    transport = new AxiosHttpTransport();

    const response = await transport.request({
      method: 'GET',
      url: `${server.url}/health`,
      headers: { 'x-api-key': 'test-secret' },
      timeoutMs: 2000,
    });

    expect(response.status).toBe(200);
    expect(response.responseTimeMs).toBeGreaterThanOrEqual(0);
    expect(server.requests[0].headers['x-api-key']).toBe('test-secret');
  });

  it('does not leak the correlation id to the probed endpoint', async () => {
    transport = new AxiosHttpTransport();

    await runWithContext({ correlationId: 'corr-1' }, () =>
      transport.request({ method: 'GET', url: `${server.url}/health`, headers: {}, timeoutMs: 2000 })
    );

    expect(server.requests[0].headers['x-correlation-id']).toBeUndefined();
  });

  it('resolves error statuses instead of throwing', async () => {
    transport = new AxiosHttpTransport();

    const response = await transport.request({
      method: 'GET',
      url: `${server.url}/unavailable`,
      headers: {},
      timeoutMs: 2000,
    });

    expect(response.status).toBe(503);
  });

  it('sends a JSON body for POST', async () => {
    transport = new AxiosHttpTransport();

    await transport.request({
      method: 'POST',
      url: `${server.url}/submit`,
      headers: {},
      body: { ping: true },
      timeoutMs: 2000,
    });

    expect(server.requests[0].method).toBe('POST');
    expect(JSON.parse(server.requests[0].body)).toEqual({ ping: true });
  });

  it('omits the body for GET', async () => {
    transport = new AxiosHttpTransport();

    await transport.request({
      method: 'GET',
      url: `${server.url}/health`,
      headers: {},
      body: { ignored: true },
      timeoutMs: 2000,
    });

    expect(server.requests[0].body).toBe('');
  });

  it('classifies a slow response as a timeout', async () => {
    transport = new AxiosHttpTransport();

    const error = await transport
      .request({ method: 'GET', url: `${server.url}/hang`, headers: {}, timeoutMs: 100 })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProbeFailure);
    expect(error).toMatchObject({ category: 'Timeout', statusCode: null });
  });

  it('classifies a refused connection', async () => {
    transport = new AxiosHttpTransport();
    const url = await unusedUrl();

    const error = await transport
      .request({ method: 'GET', url, headers: {}, timeoutMs: 2000 })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProbeFailure);
    expect(error).toMatchObject({ category: 'ConnectionError' });
  });
});

describe('classifyTransportError', () => {
  it('maps abort codes to Timeout', () => {
    const failure = classifyTransportError(new AxiosError('canceled', 'ERR_CANCELED'), 12);

    expect(failure.category).toBe('Timeout');
    expect(failure.message).toBe('Request timed out: canceled');
    expect(failure.responseTimeMs).toBe(12);
  });

  it('maps DNS failures to ConnectionError', () => {
    const failure = classifyTransportError(new AxiosError('getaddrinfo ENOTFOUND nowhere.test', 'ENOTFOUND'), 3);

    expect(failure.category).toBe('ConnectionError');
    expect(failure.message).toBe('Connection error: getaddrinfo ENOTFOUND nowhere.test');
  });

  it('maps other axios errors to ClientError', () => {
    const failure = classifyTransportError(
      new AxiosError('Maximum number of redirects exceeded', 'ERR_FR_TOO_MANY_REDIRECTS'),
      3
    );

    expect(failure.category).toBe('ClientError');
    expect(failure.message).toBe('HTTP client error: Maximum number of redirects exceeded');
  });

  it('maps non-axios errors to Unexpected', () => {
    const failure = classifyTransportError(new RangeError('bad'), 0);

    expect(failure.category).toBe('Unexpected');
    expect(failure.message).toBe('Unexpected error: bad');
  });
});
