import { STATUS_CODES } from 'node:http';

import { loggerPlugin } from '../plugins/logger.js';
import { dialAddressFor } from '../transport/dialer.js';
import { mapBodyError, mapTransportError } from '../transport/errors.js';
import { UndiciTransport, type UndiciTransportOptions } from '../transport/undici.js';
import type {
  FetchResult,
  Middleware,
  NextFunction,
  Plugin,
  Transport,
  TransportResponse,
} from '../types/index.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { toHeaderMap } from '../utils/headers.js';
import { DialfetchError, RequestBuildError } from './errors.js';
import { FetchLifecycle, type StateListener } from './lifecycle.js';
import { DialRequest, type HeaderInput } from './request.js';
import { resolveTarget } from './target.js';

export interface ClientOptions {
  transport: Transport;
  middlewares?: Middleware[];
  plugins?: Plugin[];

  /**
   * Logger for request/response diagnostics at debug level
   * @default silent
   */
  logger?: Logger;

  /** Headers sent with every fetch */
  headers?: HeaderInput;

  /**
   * Close idle pooled connections once each fetch settles
   * @default false
   */
  closeIdleConnections?: boolean;
}

export interface FetchOptions {
  /** Host or IP to open the connection to instead of the URL host */
  override?: string;
  signal?: AbortSignal;
  headers?: HeaderInput;
  onStateChange?: StateListener;
}

function normalizeOverride(address: string | undefined): string | undefined {
  const trimmed = address?.trim();
  return trimmed ? trimmed : undefined;
}

function mergeHeaders(defaults: HeaderInput | undefined, overrides: HeaderInput | undefined): Headers {
  const merged = new Headers(defaults);
  new Headers(overrides).forEach((value, name) => merged.set(name, value));
  return merged;
}

export class Client {
  private transport: Transport;
  private middlewares: Middleware[];
  private handler: NextFunction;
  private logger: Logger;
  private defaultHeaders?: HeaderInput;
  private closeIdle: boolean;

  constructor(options: ClientOptions) {
    this.transport = options.transport;
    this.middlewares = [...(options.middlewares ?? [])];
    this.logger = options.logger ?? silentLogger;
    this.defaultHeaders = options.headers;
    this.closeIdle = options.closeIdleConnections ?? false;
    this.handler = this.composeMiddlewares();

    if (options.logger) {
      loggerPlugin({ logger: options.logger, level: 'debug' })(this);
    }
    for (const plugin of options.plugins ?? []) {
      plugin(this);
    }
  }

  private composeMiddlewares(): NextFunction {
    const transportDispatch: NextFunction = (req) => this.transport.dispatch(req);

    // Last middleware calls transport
    return this.middlewares.reduceRight<NextFunction>(
      (next, middleware) => (req) => middleware(req, next),
      transportDispatch
    );
  }

  public use(middleware: Middleware): this {
    this.middlewares.push(middleware);
    this.handler = this.composeMiddlewares();
    return this;
  }

  /**
   * GET a URL, optionally opening the connection to `override` instead of
   * the URL host. The Host header and TLS verification always follow the URL.
   *
   * Resolves once the body has been read in full.
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const lifecycle = new FetchLifecycle(options.onStateChange);
    lifecycle.transition('resolving');

    let request: DialRequest;
    try {
      const target = resolveTarget(url);
      request = new DialRequest(target, {
        headers: mergeHeaders(this.defaultHeaders, options.headers),
        signal: options.signal,
        hooks: {
          onRequestSent: () => {
            if (lifecycle.state === 'dialing') lifecycle.transition('awaiting-headers');
          },
        },
      });
      const override = normalizeOverride(options.override);
      if (override !== undefined) {
        request = request.withDialOverride(override);
      }
    } catch (error) {
      lifecycle.fail();
      throw error instanceof DialfetchError
        ? error
        : new RequestBuildError(`Invalid request: ${error instanceof Error ? error.message : String(error)}`, error);
    }

    try {
      return await this.send(request, lifecycle);
    } finally {
      if (this.closeIdle) {
        await this.transport.closeIdleConnections().catch((error: unknown) => {
          this.logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Closing idle connections failed');
        });
      }
    }
  }

  private async send(request: DialRequest, lifecycle: FetchLifecycle): Promise<FetchResult> {
    const dialAddress = dialAddressFor(request.target, request.override);

    lifecycle.transition('dialing');
    let response: TransportResponse;
    try {
      response = await this.handler(request);
    } catch (error) {
      lifecycle.fail();
      throw error instanceof DialfetchError
        ? error
        : mapTransportError(error, { dialAddress, signal: request.signal });
    }

    if (lifecycle.state === 'dialing') lifecycle.transition('awaiting-headers');
    lifecycle.transition('reading-body');

    let body: Buffer;
    try {
      body = Buffer.from(await response.body.arrayBuffer());
    } catch (error) {
      response.body.destroy();
      lifecycle.fail();
      throw mapBodyError(error, request.signal);
    }

    lifecycle.transition('done');

    const status = response.statusCode;
    const statusText = STATUS_CODES[status] ?? '';
    return {
      status,
      statusText,
      statusLine: statusText ? `${status} ${statusText}` : String(status),
      protocol: response.connection.protocol,
      headers: toHeaderMap(response.headers),
      body,
      bodyLength: body.byteLength,
      target: request.target,
      dialAddress,
      connection: response.connection,
    };
  }
}

export function createClient(options: ClientOptions): Client {
  return new Client(options);
}

export interface FetchOnceOptions extends FetchOptions {
  /** Transport to use; one is created and closed around the fetch when absent */
  transport?: Transport;
  transportOptions?: UndiciTransportOptions;
  logger?: Logger;
}

/**
 * One fetch, then release every connection it opened
 */
export async function fetchOnce(url: string, options: FetchOnceOptions = {}): Promise<FetchResult> {
  const { transport, transportOptions, logger, ...fetchOptions } = options;

  if (transport) {
    return createClient({ transport, logger, closeIdleConnections: true }).fetch(url, fetchOptions);
  }

  const owned = new UndiciTransport(transportOptions);
  try {
    return await createClient({ transport: owned, logger }).fetch(url, fetchOptions);
  } finally {
    await owned.close();
  }
}
