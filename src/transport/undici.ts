import { AsyncLocalStorage } from 'node:async_hooks';
import { channel } from 'node:diagnostics_channel';
import { Socket } from 'node:net';
import { TLSSocket } from 'node:tls';

import {
  DEFAULT_BODY_TIMEOUT_MS,
  DEFAULT_DIAL_TIMEOUT_MS,
  DEFAULT_HEADERS_TIMEOUT_MS,
} from '../constants.js';
import type { DialRequest } from '../core/request.js';
import type { ConnectionInfo, NegotiatedProtocol, Transport, TransportResponse } from '../types/index.js';
import { PoolManager, type PoolStats } from '../utils/pool-manager.js';
import { runInDialScope, withDialSignal } from './dial-context.js';
import { createOverrideDialer, dialAddressFor, type DialInfo, type DialTlsOptions } from './dialer.js';
import { mapTransportError } from './errors.js';

export interface UndiciTransportOptions {
  /**
   * Bound on opening a connection, TLS handshake included (ms)
   * @default 500
   */
  connectTimeout?: number;

  /**
   * Offer h2 via ALPN on TLS connections
   * @default true
   */
  http2?: boolean;

  /** Extra trust and client credentials for TLS */
  tls?: DialTlsOptions;

  /** Max connections per origin, null for unlimited */
  connections?: number | null;
  keepAliveTimeout?: number;
  keepAliveMaxTimeout?: number;
  headersTimeout?: number;
  bodyTimeout?: number;
  maxCachedSessions?: number;

  /** Called before every connection attempt */
  onDial?: (info: DialInfo) => void;
}

/**
 * Per-dispatch record the diagnostics subscribers and the connector fill in.
 *
 * HTTP/1.1 requests report their socket through `undici:client:sendHeaders`.
 * h2 streams publish nothing of the kind, so they fall back to the socket
 * this request dialed, or to the origin's live h2 session.
 */
class Exchange {
  private socket?: Socket;
  private reused = false;
  private sent = false;
  dialed?: Socket;

  constructor(
    readonly dialAddress: string,
    private readonly onRequestSent?: () => void
  ) {}

  attach(socket: Socket): void {
    this.use(socket);
    this.markSent();
  }

  /**
   * Settle the connection record once response headers are in
   */
  settle(session?: Socket): ConnectionInfo {
    const socket = this.socket ?? this.dialed ?? session;
    if (socket !== undefined && this.socket === undefined) {
      this.use(socket);
    }
    this.markSent();

    if (socket === undefined) {
      return { protocol: 'HTTP/1.1', dialAddress: this.dialAddress, reused: false };
    }
    return {
      protocol: protocolOf(socket),
      dialAddress: this.dialAddress,
      remoteAddress: socket.remoteAddress,
      remotePort: socket.remotePort,
      reused: this.reused,
    };
  }

  private use(socket: Socket): void {
    this.socket = socket;
    this.reused = servedSockets.has(socket);
    servedSockets.add(socket);
  }

  private markSent(): void {
    if (this.sent) return;
    this.sent = true;
    this.onRequestSent?.();
  }
}

function protocolOf(socket: Socket): NegotiatedProtocol {
  return socket instanceof TLSSocket && socket.alpnProtocol === 'h2' ? 'HTTP/2.0' : 'HTTP/1.1';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

const exchangeStorage = new AsyncLocalStorage<Exchange>();
const exchanges = new WeakMap<object, Exchange>();
// Sockets that have carried at least one request
const servedSockets = new WeakSet<Socket>();

// Published synchronously from pool.request(), inside the exchange's context
channel('undici:request:create').subscribe((message: unknown) => {
  const exchange = exchangeStorage.getStore();
  if (exchange && isRecord(message) && isRecord(message.request)) {
    exchanges.set(message.request, exchange);
  }
});

channel('undici:client:sendHeaders').subscribe((message: unknown) => {
  if (!isRecord(message) || !isRecord(message.request)) return;
  const exchange = exchanges.get(message.request);
  if (exchange && message.socket instanceof Socket) {
    exchange.attach(message.socket);
  }
});

/**
 * Transport that sends each request over a pooled undici connection,
 * dialing the request's override address when it carries one.
 *
 * @example
 * ```typescript
 * const transport = new UndiciTransport({ connectTimeout: 500 });
 * const client = createClient({ transport });
 * const result = await client.fetch('https://example.com/', { override: '203.0.113.7' });
 * await transport.close();
 * ```
 */
export class UndiciTransport implements Transport {
  private pools: PoolManager;
  // Live h2 socket per origin, shared by every stream on it
  private sessions = new Map<string, Socket>();
  private headersTimeout: number;
  private bodyTimeout: number;

  constructor(options: UndiciTransportOptions = {}) {
    const allowH2 = options.http2 ?? true;

    const dial = createOverrideDialer({
      timeout: options.connectTimeout ?? DEFAULT_DIAL_TIMEOUT_MS,
      allowH2,
      tls: options.tls,
      maxCachedSessions: options.maxCachedSessions,
      onDial: options.onDial,
    });

    this.pools = new PoolManager({
      // Runs synchronously inside pool.request(), so the exchange is in scope
      connect: (connectOptions, callback) => {
        const exchange = exchangeStorage.getStore();
        dial(connectOptions, (error, socket) => {
          if (error !== null) {
            callback(error, null);
            return;
          }
          if (exchange) exchange.dialed = socket;
          callback(null, socket);
        });
      },
      connections: options.connections,
      keepAliveTimeout: options.keepAliveTimeout,
      keepAliveMaxTimeout: options.keepAliveMaxTimeout,
      allowH2,
    });
    this.headersTimeout = options.headersTimeout ?? DEFAULT_HEADERS_TIMEOUT_MS;
    this.bodyTimeout = options.bodyTimeout ?? DEFAULT_BODY_TIMEOUT_MS;
  }

  async dispatch(req: DialRequest): Promise<TransportResponse> {
    const dialAddress = dialAddressFor(req.target, req.override);
    const exchange = new Exchange(dialAddress, req.hooks?.onRequestSent);
    const scope = req.signal ? withDialSignal(req.scope, req.signal) : req.scope;
    const pool = this.pools.getPool(req.target.origin);

    const headers: Record<string, string> = {};
    req.headers.forEach((value, name) => {
      headers[name] = value;
    });

    try {
      const response = await runInDialScope(scope, () =>
        exchangeStorage.run(exchange, () =>
          pool.request({
            path: req.path,
            method: req.method,
            headers,
            signal: req.signal,
            headersTimeout: this.headersTimeout,
            bodyTimeout: this.bodyTimeout,
          })
        )
      );

      const connection = exchange.settle(this.liveSession(req.target.origin));
      if (connection.protocol === 'HTTP/2.0' && exchange.dialed) {
        this.sessions.set(req.target.origin, exchange.dialed);
      }

      return {
        statusCode: response.statusCode,
        headers: response.headers,
        body: response.body,
        connection,
      };
    } catch (error) {
      throw mapTransportError(error, { dialAddress, signal: req.signal });
    }
  }

  private liveSession(origin: string): Socket | undefined {
    const socket = this.sessions.get(origin);
    if (socket === undefined || !socket.destroyed) return socket;
    this.sessions.delete(origin);
    return undefined;
  }

  /**
   * Close pooled connections that carry no request
   */
  async closeIdleConnections(): Promise<void> {
    for (const origin of await this.pools.closeIdle()) {
      this.sessions.delete(origin);
    }
  }

  getStats(): PoolStats {
    return this.pools.getStats();
  }

  async close(): Promise<void> {
    this.sessions.clear();
    await this.pools.closeAll();
  }

  async destroy(): Promise<void> {
    this.sessions.clear();
    await this.pools.destroy();
  }
}
