import type { Client } from '../core/client.js';
import type { DialRequest } from '../core/request.js';
import type { Target } from '../core/target.js';
import type { HeaderMap } from '../utils/headers.js';

export type { Logger, LogLevel, LogMethod } from './logger.js';

export type NegotiatedProtocol = 'HTTP/1.1' | 'HTTP/2.0';

/**
 * What is known about the connection a response arrived on
 */
export interface ConnectionInfo {
  protocol: NegotiatedProtocol;
  /** host:port the request asked to dial */
  dialAddress: string;
  /** Peer of the socket that carried the request */
  remoteAddress?: string;
  remotePort?: number;
  /** True when a pooled connection carried an earlier request */
  reused: boolean;
}

/**
 * Unread response body. Callers either drain it or destroy it.
 */
export interface ResponseBody {
  arrayBuffer(): Promise<ArrayBuffer>;
  destroy(error?: Error): unknown;
}

export interface TransportResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: ResponseBody;
  connection: ConnectionInfo;
}

export interface Transport {
  dispatch(req: DialRequest): Promise<TransportResponse>;
  closeIdleConnections(): Promise<void>;
}

export type NextFunction = (req: DialRequest) => Promise<TransportResponse>;

export type Middleware = (req: DialRequest, next: NextFunction) => Promise<TransportResponse>;

export type Plugin = (client: Client) => void;

/**
 * Outcome of a completed fetch, body fully read
 */
export interface FetchResult {
  status: number;
  statusText: string;
  /** e.g. "200 OK" */
  statusLine: string;
  protocol: NegotiatedProtocol;
  headers: HeaderMap;
  body: Buffer;
  bodyLength: number;
  target: Target;
  dialAddress: string;
  connection: ConnectionInfo;
}
