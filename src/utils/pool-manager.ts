/**
 * Pool Manager - connection pools keyed by logical origin
 *
 * One undici Pool per scheme://host:port the caller addressed. The dial
 * override is not part of the key: a pooled connection opened under one
 * override may serve a later request carrying another.
 */

import { Pool, type buildConnector } from 'undici';

import {
  DEFAULT_HTTP1_PIPELINING,
  DEFAULT_KEEP_ALIVE_MAX_TIMEOUT_MS,
  DEFAULT_KEEP_ALIVE_TIMEOUT_MS,
} from '../constants.js';

export interface PoolManagerOptions {
  /** Connector shared by every pool */
  connect: buildConnector.connector;

  /** Max connections per origin, null for unlimited */
  connections?: number | null;

  pipelining?: number;
  keepAliveTimeout?: number;
  keepAliveMaxTimeout?: number;
  allowH2?: boolean;
}

export interface PoolStats {
  /** Number of live pools */
  poolCount: number;

  /** Origins with a pool */
  origins: string[];

  /** Open sockets across all pools */
  connected: number;

  /** Requests currently in flight */
  running: number;
}

export class PoolManager {
  private pools = new Map<string, Pool>();
  private options: PoolManagerOptions;

  constructor(options: PoolManagerOptions) {
    this.options = options;
  }

  /**
   * Get or create the pool for an origin
   */
  getPool(origin: string): Pool {
    let pool = this.pools.get(origin);
    if (!pool) {
      pool = new Pool(origin, {
        connect: this.options.connect,
        connections: this.options.connections ?? null,
        pipelining: this.options.pipelining ?? DEFAULT_HTTP1_PIPELINING,
        keepAliveTimeout: this.options.keepAliveTimeout ?? DEFAULT_KEEP_ALIVE_TIMEOUT_MS,
        keepAliveMaxTimeout: this.options.keepAliveMaxTimeout ?? DEFAULT_KEEP_ALIVE_MAX_TIMEOUT_MS,
        allowH2: this.options.allowH2 ?? false,
      });
      this.pools.set(origin, pool);
    }
    return pool;
  }

  /**
   * Close pools with no request running, pending or queued.
   *
   * @returns origins whose pools were closed
   */
  async closeIdle(): Promise<string[]> {
    const idle: Array<[string, Pool]> = [];

    for (const [origin, pool] of this.pools) {
      const { running, pending, queued } = pool.stats;
      if (running === 0 && pending === 0 && queued === 0) {
        idle.push([origin, pool]);
      }
    }

    for (const [origin] of idle) {
      this.pools.delete(origin);
    }

    await Promise.all(idle.map(([, pool]) => pool.close()));
    return idle.map(([origin]) => origin);
  }

  /**
   * Get statistics about managed pools
   */
  getStats(): PoolStats {
    let connected = 0;
    let running = 0;
    for (const pool of this.pools.values()) {
      connected += pool.stats.connected;
      running += pool.stats.running;
    }

    return {
      poolCount: this.pools.size,
      origins: Array.from(this.pools.keys()),
      connected,
      running,
    };
  }

  /**
   * Close all pools, letting in-flight requests finish
   */
  async closeAll(): Promise<void> {
    const closing = Array.from(this.pools.values(), (pool) => pool.close());
    this.pools.clear();
    await Promise.all(closing);
  }

  /**
   * Destroy all pools immediately (non-graceful)
   */
  async destroy(): Promise<void> {
    const destroying = Array.from(this.pools.values(), (pool) => pool.destroy());
    this.pools.clear();
    await Promise.all(destroying);
  }
}
