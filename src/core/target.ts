import { DEFAULT_PORTS } from '../constants.js';
import { InvalidUrlError, MissingHostError, UnknownSchemeError } from './errors.js';

/**
 * Logical identity of a fetch: what the URL names, before any override
 */
export interface Target {
  readonly scheme: string;
  /** Bare hostname, IPv6 without brackets */
  readonly host: string;
  readonly port: string;
  /** scheme://host:port, used as the connection pool key */
  readonly origin: string;
  readonly url: URL;
}

// scheme://[userinfo@]host[:port]
const AUTHORITY_PORT = /^[a-z][a-z0-9+.-]*:\/\/(?:[^@/?#]*@)?(?:\[[^\]]*\]|[^:/?#]*)(?::(\d+))?/i;

export function defaultPortFor(scheme: string): string | undefined {
  return DEFAULT_PORTS[scheme.toLowerCase()];
}

export function stripBrackets(host: string): string {
  return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
}

/**
 * Join host and port the way a socket address is written (IPv6 gets brackets)
 */
export function joinHostPort(host: string, port: string): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

/**
 * The WHATWG parser drops a port equal to the scheme default, so the raw
 * authority is read for it as well.
 */
function explicitPort(input: string, url: URL): string | undefined {
  if (url.port) return url.port;
  const match = AUTHORITY_PORT.exec(input);
  if (!match?.[1]) return undefined;
  return String(Number.parseInt(match[1], 10));
}

/**
 * Resolve a URL string into the target a fetch will address.
 *
 * Port selection: explicit URL port, then the scheme default, else
 * {@link UnknownSchemeError}.
 */
export function resolveTarget(input: string): Target {
  const raw = input.trim();

  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    throw new InvalidUrlError(input, error);
  }

  const host = stripBrackets(url.hostname);
  if (!host) {
    throw new MissingHostError(input);
  }

  const scheme = url.protocol.replace(/:$/, '').toLowerCase();
  const port = explicitPort(raw, url) ?? defaultPortFor(scheme);
  if (!port) {
    throw new UnknownSchemeError(scheme);
  }

  return Object.freeze({
    scheme,
    host,
    port,
    origin: `${scheme}://${joinHostPort(host, port)}`,
    url,
  });
}
