/**
 * dialfetch - GET a URL over a connection to an address of your choosing
 *
 * @example
 * ```typescript
 * import { fetchOnce } from 'dialfetch';
 *
 * // Connect to 203.0.113.7; Host header and certificate checks stay on example.com
 * const result = await fetchOnce('https://example.com/', { override: '203.0.113.7' });
 * console.log(result.statusLine, result.protocol, result.bodyLength);
 * ```
 *
 * @example Reusing connections across fetches
 * ```typescript
 * import { createClient, UndiciTransport } from 'dialfetch';
 *
 * const transport = new UndiciTransport({ connectTimeout: 500 });
 * const client = createClient({ transport });
 * await client.fetch('https://example.com/a', { override: '203.0.113.7' });
 * await client.fetch('https://example.com/b', { override: '203.0.113.7' });
 * await transport.close();
 * ```
 */

export { Client, createClient, fetchOnce } from './core/client.js';
export type { ClientOptions, FetchOptions, FetchOnceOptions } from './core/client.js';
export {
  DialfetchError,
  InvalidUrlError,
  MissingHostError,
  UnknownSchemeError,
  RequestBuildError,
  DialError,
  ReadError,
  StateError,
} from './core/errors.js';
export type { DialFailureReason, ReadFailureReason } from './core/errors.js';
export { FetchLifecycle } from './core/lifecycle.js';
export type { FetchState, StateListener } from './core/lifecycle.js';
export { DialRequest } from './core/request.js';
export type { DialRequestOptions, HeaderInput, RequestHooks } from './core/request.js';
export { resolveTarget, joinHostPort, defaultPortFor } from './core/target.js';
export type { Target } from './core/target.js';
export { loggerPlugin } from './plugins/logger.js';
export type { LoggerPluginOptions } from './plugins/logger.js';
export {
  ROOT_DIAL_SCOPE,
  withDialOverride,
  withDialSignal,
  readDialOverride,
  runInDialScope,
  currentDialScope,
} from './transport/dial-context.js';
export type { DialScope } from './transport/dial-context.js';
export { createOverrideDialer, dialAddressFor, overrideHost } from './transport/dialer.js';
export type { DialInfo, DialTlsOptions, OverrideDialerOptions } from './transport/dialer.js';
export { mapTransportError, mapBodyError } from './transport/errors.js';
export { UndiciTransport } from './transport/undici.js';
export type { UndiciTransportOptions } from './transport/undici.js';
export type * from './types/index.js';
export { consoleLogger, silentLogger, createLevelLogger } from './types/logger.js';
export { StreamLogger } from './utils/logger.js';
export { toHeaderMap } from './utils/headers.js';
export type { HeaderMap } from './utils/headers.js';
