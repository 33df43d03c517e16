import { isIP } from 'node:net';
import { checkServerIdentity, type PeerCertificate } from 'node:tls';

import { buildConnector, errors } from 'undici';

import {
  DEFAULT_DIAL_TIMEOUT_MS,
  DEFAULT_MAX_CACHED_SESSIONS,
  DEFAULT_PORTS,
} from '../constants.js';
import { DialError } from '../core/errors.js';
import { joinHostPort, stripBrackets, type Target } from '../core/target.js';
import { currentDialScope, readDialOverride } from './dial-context.js';

export interface DialTlsOptions {
  ca?: string | Buffer | Array<string | Buffer>;
  cert?: string | Buffer;
  key?: string | Buffer;
  rejectUnauthorized?: boolean;
}

/**
 * Reported once per connection attempt, before the socket opens
 */
export interface DialInfo {
  /** host:port the request is addressed to */
  logicalAddress: string;
  /** host:port the socket is opened to */
  dialAddress: string;
  override?: string;
  protocol: string;
}

export interface OverrideDialerOptions {
  /**
   * Connection establishment bound, TLS handshake included
   * @default 500
   */
  timeout?: number;
  allowH2?: boolean;
  keepAlive?: boolean;
  maxCachedSessions?: number;
  tls?: DialTlsOptions;
  onDial?: (info: DialInfo) => void;
}

export type ConnectorFactory = (options: buildConnector.BuildOptions) => buildConnector.connector;

/**
 * Host part of an override address. A port the caller may have included
 * is dropped: the port always comes from the target.
 */
export function overrideHost(address: string): string {
  const value = address.trim();

  if (value.startsWith('[')) {
    const end = value.indexOf(']');
    return end === -1 ? value.slice(1) : value.slice(1, end);
  }

  if (isIP(value) !== 0) return value;

  const colon = value.indexOf(':');
  if (colon !== -1 && colon === value.lastIndexOf(':')) {
    return value.slice(0, colon);
  }

  return value;
}

export function dialAddressFor(target: Target, override?: string): string {
  const host = override === undefined ? target.host : overrideHost(override);
  return joinHostPort(host, target.port);
}

function portFor(options: buildConnector.Options): string {
  if (options.port) return options.port;
  return DEFAULT_PORTS[options.protocol.replace(/:$/, '')] ?? '';
}

/**
 * Run a connector under a timer of its own. undici's connect timeout runs on
 * a coarse clock and can overshoot short bounds by up to a second.
 */
function connectWithin(
  connector: buildConnector.connector,
  connectOptions: buildConnector.Options,
  timeout: number,
  dialAddress: string,
  callback: buildConnector.Callback
): void {
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    callback(
      new errors.ConnectTimeoutError(`Connect Timeout Error (attempted address: ${dialAddress}, timeout: ${timeout}ms)`),
      null
    );
  }, timeout);

  connector(connectOptions, (error, socket) => {
    if (timedOut) {
      socket?.destroy();
      return;
    }
    clearTimeout(timer);
    if (error !== null) {
      callback(error, null);
      return;
    }
    callback(null, socket);
  });
}

function cancelledDial(dialAddress: string): DialError {
  return new DialError(`Dial to ${dialAddress} was cancelled`, {
    reason: 'cancelled',
    dialAddress,
  });
}

/**
 * Build an undici connector that honours the dial override bound to the
 * current request scope.
 *
 * Only the socket's destination changes. SNI and certificate verification
 * stay on the logical hostname the pool was created for, so a server at the
 * override address must still prove it serves that hostname.
 */
export function createOverrideDialer(
  options: OverrideDialerOptions = {},
  build: ConnectorFactory = buildConnector
): buildConnector.connector {
  const timeout = options.timeout ?? DEFAULT_DIAL_TIMEOUT_MS;
  const baseOptions = {
    ...options.tls,
    timeout,
    allowH2: options.allowH2 ?? false,
    keepAlive: options.keepAlive ?? true,
    maxCachedSessions: options.maxCachedSessions ?? DEFAULT_MAX_CACHED_SESSIONS,
  };

  const direct = build(baseOptions);
  const verifying = new Map<string, buildConnector.connector>();

  const verifyingFor = (logicalHost: string): buildConnector.connector => {
    let connector = verifying.get(logicalHost);
    if (!connector) {
      connector = build({
        ...baseOptions,
        checkServerIdentity: (_servername: string, cert: PeerCertificate) =>
          checkServerIdentity(logicalHost, cert),
      });
      verifying.set(logicalHost, connector);
    }
    return connector;
  };

  return (connectOptions, callback) => {
    const scope = currentDialScope();
    const override = readDialOverride(scope);

    const logicalHost = stripBrackets(connectOptions.hostname);
    const port = portFor(connectOptions);
    const dialHost = override === undefined ? logicalHost : overrideHost(override);
    const dialAddress = joinHostPort(dialHost, port);

    if (scope?.signal?.aborted) {
      callback(cancelledDial(dialAddress), null);
      return;
    }

    options.onDial?.({
      logicalAddress: joinHostPort(logicalHost, port),
      dialAddress,
      override,
      protocol: connectOptions.protocol,
    });

    if (override === undefined) {
      connectWithin(direct, connectOptions, timeout, dialAddress, callback);
      return;
    }

    // IP literals cannot be sent as SNI
    const servername = connectOptions.servername || (isIP(logicalHost) === 0 ? logicalHost : undefined);

    const dialOptions = { ...connectOptions, hostname: dialHost, servername };
    connectWithin(verifyingFor(logicalHost), dialOptions, timeout, dialAddress, (error, socket) => {
      if (error !== null) {
        callback(error, null);
        return;
      }
      if (scope?.signal?.aborted) {
        socket.destroy();
        callback(cancelledDial(dialAddress), null);
        return;
      }
      callback(null, socket);
    });
  };
}
