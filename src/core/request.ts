import { ROOT_DIAL_SCOPE, withDialOverride, type DialScope } from '../transport/dial-context.js';
import { RequestBuildError } from './errors.js';
import type { Target } from './target.js';

export type HeaderInput = Headers | Record<string, string> | Array<[string, string]>;

export interface RequestHooks {
  /** Request headers were written to a connection */
  onRequestSent?: () => void;
}

export interface DialRequestOptions {
  headers?: HeaderInput;
  signal?: AbortSignal;
  scope?: DialScope;
  hooks?: RequestHooks;
}

const SUPPORTED_SCHEMES = new Set(['http', 'https']);

// Set by the transport from the target and connection
const RESERVED_HEADERS = new Set(['host', 'connection', 'keep-alive', 'transfer-encoding', 'upgrade']);

function buildHeaders(input: HeaderInput | undefined): Headers {
  let headers: Headers;
  try {
    headers = new Headers(input);
  } catch (error) {
    throw new RequestBuildError(`Invalid request headers: ${error instanceof Error ? error.message : String(error)}`, error);
  }

  for (const name of headers.keys()) {
    if (RESERVED_HEADERS.has(name)) {
      throw new RequestBuildError(`Header "${name}" cannot be set by the caller`);
    }
  }
  return headers;
}

/**
 * An immutable GET for a resolved target, plus the dial scope it carries
 */
export class DialRequest {
  public readonly url: string;
  public readonly method = 'GET' as const;
  public readonly target: Target;
  public readonly headers: Headers;
  public readonly signal?: AbortSignal;
  public readonly scope: DialScope;
  public readonly hooks?: RequestHooks;

  constructor(target: Target, options: DialRequestOptions = {}) {
    if (!SUPPORTED_SCHEMES.has(target.scheme)) {
      throw new RequestBuildError(`Cannot send a request over scheme "${target.scheme}"`);
    }

    this.url = target.url.href;
    this.target = target;
    this.headers = buildHeaders(options.headers);
    this.signal = options.signal;
    this.scope = options.scope ?? ROOT_DIAL_SCOPE;
    this.hooks = options.hooks;
  }

  /** Path and query as sent on the request line */
  get path(): string {
    return `${this.target.url.pathname}${this.target.url.search}`;
  }

  get override(): string | undefined {
    return this.scope.override;
  }

  withDialOverride(address: string): DialRequest {
    return new DialRequest(this.target, {
      headers: this.headers,
      signal: this.signal,
      scope: withDialOverride(this.scope, address),
      hooks: this.hooks,
    });
  }

  withHeader(name: string, value: string): DialRequest {
    const headers = new Headers(this.headers);
    headers.set(name, value);
    return new DialRequest(this.target, {
      headers,
      signal: this.signal,
      scope: this.scope,
      hooks: this.hooks,
    });
  }

  withHooks(hooks: RequestHooks): DialRequest {
    return new DialRequest(this.target, {
      headers: this.headers,
      signal: this.signal,
      scope: this.scope,
      hooks,
    });
  }
}
