import type { DialRequest } from '../core/request.js';
import { dialAddressFor } from '../transport/dialer.js';
import type { Plugin } from '../types/index.js';
import { consoleLogger, type Logger } from '../types/logger.js';

export interface LoggerPluginOptions {
  /**
   * Logger instance (Pino, Winston, console, or custom)
   * @default console
   *
   * @example Pino
   * ```typescript
   * import pino from 'pino';
   * client.use(loggerPlugin({ logger: pino() }));
   * ```
   */
  logger?: Logger;

  /**
   * Log level for requests/responses
   * @default 'info'
   */
  level?: 'debug' | 'info';

  /**
   * Show request headers
   * @default false
   */
  showHeaders?: boolean;
}

const SENSITIVE_HEADERS = new Set(['authorization', 'proxy-authorization', 'cookie']);

function requestHeaders(req: DialRequest): Record<string, string> {
  const headers: Record<string, string> = {};
  req.headers.forEach((value, name) => {
    headers[name] = SENSITIVE_HEADERS.has(name) ? '[REDACTED]' : value;
  });
  return headers;
}

/**
 * Logger plugin - logs each fetch, where it dialed, and how it ended
 *
 * @example
 * ```typescript
 * const client = createClient({ transport, plugins: [loggerPlugin({ level: 'debug' })] });
 * ```
 */
export function loggerPlugin(options: LoggerPluginOptions = {}): Plugin {
  const log = options.logger ?? consoleLogger;
  const level = options.level ?? 'info';
  const showHeaders = options.showHeaders ?? false;

  const emit = (data: object, message: string): void => {
    if (level === 'debug') {
      log.debug(data, message);
    } else {
      log.info(data, message);
    }
  };

  return (client) => {
    client.use(async (req, next) => {
      const start = performance.now();
      const dialAddress = dialAddressFor(req.target, req.override);

      const requestData: Record<string, unknown> = {
        type: 'request',
        method: req.method,
        url: req.url,
        dialAddress,
      };
      if (req.override !== undefined) {
        requestData.override = req.override;
      }
      if (showHeaders) {
        requestData.headers = requestHeaders(req);
      }
      emit(requestData, `--> ${req.method} ${req.url}`);

      try {
        const res = await next(req);
        emit(
          {
            type: 'response',
            status: res.statusCode,
            protocol: res.connection.protocol,
            remoteAddress: res.connection.remoteAddress,
            reused: res.connection.reused,
            duration: Math.round(performance.now() - start),
          },
          `<-- ${res.statusCode} ${req.method} ${req.url}`
        );
        return res;
      } catch (error) {
        log.error(
          {
            type: 'error',
            url: req.url,
            dialAddress,
            error: error instanceof Error ? error.message : String(error),
            duration: Math.round(performance.now() - start),
          },
          `xxx ${req.method} ${req.url}`
        );
        throw error;
      }
    });
  };
}
