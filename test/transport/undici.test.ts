import type { IncomingMessage, ServerResponse } from 'node:http';

import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest';

import { createClient } from '../../src/core/client.js';
import { DialError, ReadError } from '../../src/core/errors.js';
import type { FetchState } from '../../src/core/lifecycle.js';
import { DialRequest } from '../../src/core/request.js';
import { resolveTarget } from '../../src/core/target.js';
import { UndiciTransport } from '../../src/transport/undici.js';
import { startHttpServer, type TestServer } from '../helpers/servers.js';

function handler(req: IncomingMessage, res: ServerResponse): void {
  if (req.url === '/host') {
    res.writeHead(200, { 'content-type': 'text/plain' });
    res.end(req.headers.host ?? '');
  } else if (req.url === '/headers') {
    res.setHeader('set-cookie', ['a=1', 'b=2']);
    res.setHeader('x-request-header', req.headers['x-test'] ?? '');
    res.writeHead(200);
    res.end('ok');
  } else if (req.url === '/slow') {
    // Never answers; closed with the server
  } else if (req.url === '/truncated') {
    res.writeHead(200, { 'content-length': '100' });
    res.write('hello');
    setTimeout(() => res.socket?.destroy(), 20);
  } else {
    res.writeHead(404, { 'content-type': 'text/plain' });
    res.end('Not Found');
  }
}

async function unusedPort(): Promise<number> {
  const server = await startHttpServer(() => {});
  await server.close();
  return server.port;
}

describe('UndiciTransport', () => {
  let server: TestServer;
  let transport: UndiciTransport;

  beforeAll(async () => {
    server = await startHttpServer(handler);
  });

  afterAll(async () => {
    await server.close();
  });

  afterEach(async () => {
    await transport?.destroy();
  });

  it('fetches without an override', async () => {
    transport = new UndiciTransport();
    const client = createClient({ transport });

    const result = await client.fetch(`http://127.0.0.1:${server.port}/host`);

    expect(result.statusLine).toBe('200 OK');
    expect(result.protocol).toBe('HTTP/1.1');
    expect(result.body.toString()).toBe(`127.0.0.1:${server.port}`);
    expect(result.dialAddress).toBe(`127.0.0.1:${server.port}`);
  });

  it('connects to the override while Host stays on the URL host', async () => {
    transport = new UndiciTransport();
    const client = createClient({ transport });

    const result = await client.fetch(`http://pinned.test:${server.port}/host`, { override: '127.0.0.1' });

    expect(result.body.toString()).toBe(`pinned.test:${server.port}`);
    expect(result.dialAddress).toBe(`127.0.0.1:${server.port}`);
    expect(result.connection.remoteAddress).toBe('127.0.0.1');
    expect(result.connection.remotePort).toBe(server.port);
  });

  it('returns every header value and caller headers reach the server', async () => {
    transport = new UndiciTransport();
    const client = createClient({ transport });

    const result = await client.fetch(`http://pinned.test:${server.port}/headers`, {
      override: '127.0.0.1',
      headers: { 'x-test': 'forwarded' },
    });

    expect(result.headers['set-cookie']).toEqual(['a=1', 'b=2']);
    expect(result.headers['x-request-header']).toEqual(['forwarded']);
    expect(result.bodyLength).toBe(2);
  });

  it('returns non-2xx responses as results', async () => {
    transport = new UndiciTransport();
    const client = createClient({ transport });

    const result = await client.fetch(`http://127.0.0.1:${server.port}/missing`);

    expect(result.statusLine).toBe('404 Not Found');
    expect(result.body.toString()).toBe('Not Found');
  });

  it('passes through every lifecycle state', async () => {
    transport = new UndiciTransport();
    const client = createClient({ transport });
    const states: FetchState[] = [];

    await client.fetch(`http://127.0.0.1:${server.port}/host`, { onStateChange: (state) => states.push(state) });

    expect(states).toEqual(['resolving', 'dialing', 'awaiting-headers', 'reading-body', 'done']);
  });

  it('fires onRequestSent once headers are written', async () => {
    transport = new UndiciTransport();
    let sent = 0;
    const request = new DialRequest(resolveTarget(`http://127.0.0.1:${server.port}/host`), {
      hooks: { onRequestSent: () => (sent += 1) },
    });

    const response = await transport.dispatch(request);
    await response.body.arrayBuffer();

    expect(sent).toBe(1);
    expect(response.statusCode).toBe(200);
  });

  describe('connection pooling', () => {
    it('reuses a connection for the same origin', async () => {
      transport = new UndiciTransport();
      const client = createClient({ transport });
      const url = `http://pinned.test:${server.port}/host`;

      const first = await client.fetch(url, { override: '127.0.0.1' });
      const second = await client.fetch(url, { override: '127.0.0.1' });

      expect(first.connection.reused).toBe(false);
      expect(second.connection.reused).toBe(true);
      expect(transport.getStats()).toMatchObject({ poolCount: 1, origins: [`http://pinned.test:${server.port}`] });
    });

    it('keys pools by URL origin, so a pooled connection outlives an override change', async () => {
      transport = new UndiciTransport();
      const client = createClient({ transport });
      const url = `http://pinned.test:${server.port}/host`;

      await client.fetch(url, { override: '127.0.0.1' });
      const stale = await client.fetch(url, { override: '127.0.0.2' });

      expect(stale.connection.reused).toBe(true);
      expect(stale.connection.remoteAddress).toBe('127.0.0.1');
      expect(stale.dialAddress).toBe(`127.0.0.2:${server.port}`);

      await transport.closeIdleConnections();
      expect(transport.getStats().poolCount).toBe(0);

      const fresh = await client.fetch(url, { override: '127.0.0.2' }).catch((e: unknown) => e);
      expect(fresh).toBeInstanceOf(DialError);
      expect(fresh).toMatchObject({ reason: 'refused', dialAddress: `127.0.0.2:${server.port}` });
    });

    it('gives concurrent fetches to different origins their own override', async () => {
      transport = new UndiciTransport();
      const client = createClient({ transport });

      const [reached, refused] = await Promise.allSettled([
        client.fetch(`http://a.test:${server.port}/host`, { override: '127.0.0.1' }),
        client.fetch(`http://b.test:${server.port}/host`, { override: '127.0.0.2' }),
      ]);

      expect(reached).toMatchObject({ status: 'fulfilled', value: { dialAddress: `127.0.0.1:${server.port}` } });
      expect(refused).toMatchObject({
        status: 'rejected',
        reason: { reason: 'refused', dialAddress: `127.0.0.2:${server.port}` },
      });
    });

    it('keeps concurrent overrides apart within one origin', async () => {
      transport = new UndiciTransport();
      const client = createClient({ transport });
      const url = `http://pinned.test:${server.port}/host`;

      const [reached, refused] = await Promise.allSettled([
        client.fetch(url, { override: '127.0.0.1' }),
        client.fetch(url, { override: '127.0.0.2' }),
      ]);

      expect(reached).toMatchObject({
        status: 'fulfilled',
        value: { dialAddress: `127.0.0.1:${server.port}`, connection: { remoteAddress: '127.0.0.1' } },
      });
      expect(refused).toMatchObject({
        status: 'rejected',
        reason: { reason: 'refused', dialAddress: `127.0.0.2:${server.port}` },
      });
      expect(transport.getStats().origins).toEqual([`http://pinned.test:${server.port}`]);
    });

    it('closes idle connections after each fetch when configured', async () => {
      transport = new UndiciTransport();
      const client = createClient({ transport, closeIdleConnections: true });

      await client.fetch(`http://127.0.0.1:${server.port}/host`);

      expect(transport.getStats().poolCount).toBe(0);
    });
  });

  describe('failures', () => {
    it('reports a refused connection with the dial address', async () => {
      transport = new UndiciTransport();
      const client = createClient({ transport });
      const port = await unusedPort();

      const error = await client.fetch(`http://pinned.test:${port}/`, { override: '127.0.0.1' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DialError);
      expect(error).toMatchObject({ reason: 'refused', systemCode: 'ECONNREFUSED', dialAddress: `127.0.0.1:${port}` });
    });

    it('cancels before dialing when the signal is already aborted', async () => {
      transport = new UndiciTransport();
      const client = createClient({ transport });
      const controller = new AbortController();
      controller.abort();

      const error = await client
        .fetch(`http://pinned.test:${server.port}/host`, { override: '127.0.0.1', signal: controller.signal })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DialError);
      expect(error).toMatchObject({ reason: 'cancelled' });
    });

    it('cancels while waiting for headers', async () => {
      transport = new UndiciTransport();
      const client = createClient({ transport });
      const controller = new AbortController();
      const states: FetchState[] = [];
      setTimeout(() => controller.abort(), 50);

      const error = await client
        .fetch(`http://127.0.0.1:${server.port}/slow`, {
          signal: controller.signal,
          onStateChange: (state) => states.push(state),
        })
        .catch((e: unknown) => e);

      expect(error).toMatchObject({ reason: 'cancelled' });
      expect(states).toEqual(['resolving', 'dialing', 'awaiting-headers', 'failed']);
    });

    it('times out waiting for headers', async () => {
      transport = new UndiciTransport({ headersTimeout: 100 });
      const client = createClient({ transport });

      const error = await client.fetch(`http://127.0.0.1:${server.port}/slow`).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DialError);
      expect(error).toMatchObject({ reason: 'timeout', systemCode: 'UND_ERR_HEADERS_TIMEOUT' });
    });

    it('reports a body cut short as a read failure', async () => {
      transport = new UndiciTransport();
      const client = createClient({ transport });
      const states: FetchState[] = [];

      const error = await client
        .fetch(`http://127.0.0.1:${server.port}/truncated`, { onStateChange: (state) => states.push(state) })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ReadError);
      expect(error).toMatchObject({ reason: 'stream' });
      expect(states).toEqual(['resolving', 'dialing', 'awaiting-headers', 'reading-body', 'failed']);
    });
  });
});
