import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Http2ServerRequest, Http2ServerResponse } from 'node:http2';

import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest';

import { createClient } from '../../src/core/client.js';
import { DialError } from '../../src/core/errors.js';
import { UndiciTransport } from '../../src/transport/undici.js';
import {
  startHttp2Server,
  startHttpsServer,
  startSilentServer,
  TEST_CA,
  type TestServer,
} from '../helpers/servers.js';

function handler(req: IncomingMessage, res: ServerResponse): void {
  res.writeHead(200, { 'content-type': 'application/json' });
  res.end(JSON.stringify({ host: req.headers.host, path: req.url }));
}

describe('TLS with a dial override', () => {
  let server: TestServer;
  let transport: UndiciTransport;

  beforeAll(async () => {
    server = await startHttpsServer(handler);
  });

  afterAll(async () => {
    await server.close();
  });

  afterEach(async () => {
    await transport?.destroy();
  });

  it('verifies the certificate against the URL host, not the dialed IP', async () => {
    transport = new UndiciTransport({ tls: { ca: TEST_CA }, http2: false });
    const client = createClient({ transport });

    const result = await client.fetch(`https://example.test:${server.port}/`, { override: '127.0.0.1' });

    expect(result.status).toBe(200);
    expect(JSON.parse(result.body.toString())).toEqual({
      host: `example.test:${server.port}`,
      path: '/',
    });
  });

  it('rejects a certificate that does not cover the URL host', async () => {
    transport = new UndiciTransport({ tls: { ca: TEST_CA }, http2: false });
    const client = createClient({ transport });

    const error = await client
      .fetch(`https://other.test:${server.port}/`, { override: '127.0.0.1' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DialError);
    expect(error).toMatchObject({
      reason: 'tls',
      systemCode: 'ERR_TLS_CERT_ALTNAME_INVALID',
      dialAddress: `127.0.0.1:${server.port}`,
    });
  });

  it('rejects a server signed by an authority it does not trust', async () => {
    transport = new UndiciTransport({ http2: false });
    const client = createClient({ transport });

    const error = await client
      .fetch(`https://example.test:${server.port}/`, { override: '127.0.0.1' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DialError);
    expect(error).toMatchObject({ reason: 'tls' });
  });

  it('reads the same body as a fetch addressed to the IP directly', async () => {
    transport = new UndiciTransport({ tls: { ca: TEST_CA }, http2: false });
    const client = createClient({ transport });

    const direct = await client.fetch(`https://127.0.0.1:${server.port}/`);
    const viaOverride = await client.fetch(`https://127.0.0.1:${server.port}/`, { override: '127.0.0.1' });

    expect(viaOverride.body.equals(direct.body)).toBe(true);
    expect(JSON.parse(direct.body.toString())).toEqual({ host: `127.0.0.1:${server.port}`, path: '/' });
  });

  it('reports HTTP/1.1 over TLS when HTTP/2 is not offered', async () => {
    transport = new UndiciTransport({ tls: { ca: TEST_CA }, http2: false });
    const client = createClient({ transport });

    const result = await client.fetch(`https://example.test:${server.port}/`, { override: '127.0.0.1' });

    expect(result.protocol).toBe('HTTP/1.1');
  });
});

describe('HTTP/2 with a dial override', () => {
  let server: TestServer;
  let transport: UndiciTransport;

  beforeAll(async () => {
    server = await startHttp2Server((req: Http2ServerRequest, res: Http2ServerResponse) => {
      res.writeHead(200, { 'content-type': 'text/plain' });
      res.end(req.httpVersion);
    });
  });

  afterAll(async () => {
    await server.close();
  });

  afterEach(async () => {
    await transport?.destroy();
  });

  it('reports HTTP/2.0 when the server negotiates h2', async () => {
    transport = new UndiciTransport({ tls: { ca: TEST_CA } });
    const client = createClient({ transport });

    const result = await client.fetch(`https://example.test:${server.port}/`, { override: '127.0.0.1' });

    expect(result.body.toString()).toBe('2.0');
    expect(result.protocol).toBe('HTTP/2.0');
    expect(result.connection).toMatchObject({
      protocol: 'HTTP/2.0',
      remoteAddress: '127.0.0.1',
      remotePort: server.port,
      reused: false,
    });
  });

  it('marks later streams on the same session as reused', async () => {
    transport = new UndiciTransport({ tls: { ca: TEST_CA } });
    const client = createClient({ transport });
    const url = `https://example.test:${server.port}/`;

    await client.fetch(url, { override: '127.0.0.1' });
    const second = await client.fetch(url, { override: '127.0.0.1' });

    expect(second.protocol).toBe('HTTP/2.0');
    expect(second.connection).toMatchObject({ remoteAddress: '127.0.0.1', reused: true });
  });

  it('falls back to HTTP/1.1 on the same server when h2 is not offered', async () => {
    transport = new UndiciTransport({ tls: { ca: TEST_CA }, http2: false });
    const client = createClient({ transport });

    const result = await client.fetch(`https://example.test:${server.port}/`, { override: '127.0.0.1' });

    expect(result.body.toString()).toBe('1.1');
    expect(result.protocol).toBe('HTTP/1.1');
  });
});

describe('connect bound', () => {
  let server: TestServer;
  let transport: UndiciTransport;

  beforeAll(async () => {
    server = await startSilentServer();
  });

  afterAll(async () => {
    await server.close();
  });

  afterEach(async () => {
    await transport?.destroy();
  });

  it('gives up on a handshake that never completes within the connect timeout', async () => {
    transport = new UndiciTransport({ tls: { ca: TEST_CA }, connectTimeout: 300 });
    const client = createClient({ transport });
    const started = performance.now();

    const error = await client
      .fetch(`https://example.test:${server.port}/`, { override: '127.0.0.1' })
      .catch((e: unknown) => e);
    const elapsed = performance.now() - started;

    expect(error).toBeInstanceOf(DialError);
    expect(error).toMatchObject({ reason: 'timeout', dialAddress: `127.0.0.1:${server.port}` });
    expect(elapsed).toBeGreaterThanOrEqual(250);
    expect(elapsed).toBeLessThan(800);
  });
});
