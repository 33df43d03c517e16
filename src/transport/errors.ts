import { errors as undiciErrors } from 'undici';

import { DialError, DialfetchError, ReadError } from '../core/errors.js';

const CERTIFICATE_CODES = new Set([
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_UNTRUSTED',
  'CERT_REJECTED',
  'CERT_SIGNATURE_FAILURE',
  'HOSTNAME_MISMATCH',
]);

export function isTlsErrorCode(code: string): boolean {
  return code.startsWith('ERR_TLS_') || code.startsWith('ERR_SSL_') || CERTIFICATE_CODES.has(code);
}

/**
 * System or library error code, looking one level into `cause`
 */
export function errorCodeOf(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  return error.cause === error ? undefined : errorCodeOf(error.cause);
}

function isAbortError(error: unknown): boolean {
  return (
    error instanceof undiciErrors.RequestAbortedError ||
    (error instanceof Error && error.name === 'AbortError') ||
    errorCodeOf(error) === 'ABORT_ERR'
  );
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface TransportErrorContext {
  dialAddress: string;
  signal?: AbortSignal;
}

/**
 * Map anything thrown before response headers arrive to a {@link DialError}
 */
export function mapTransportError(error: unknown, context: TransportErrorContext): DialfetchError {
  if (error instanceof DialfetchError) return error;

  const { dialAddress } = context;
  const systemCode = errorCodeOf(error);
  const base = { dialAddress, systemCode, cause: error };

  if (error instanceof undiciErrors.ConnectTimeoutError || systemCode === 'UND_ERR_CONNECT_TIMEOUT') {
    return new DialError(`Connecting to ${dialAddress} timed out`, { ...base, reason: 'timeout' });
  }

  if (context.signal?.aborted || isAbortError(error)) {
    return new DialError(`Request to ${dialAddress} was cancelled`, { ...base, reason: 'cancelled' });
  }

  if (error instanceof undiciErrors.HeadersTimeoutError || systemCode === 'UND_ERR_HEADERS_TIMEOUT') {
    return new DialError(`Timed out waiting for response headers from ${dialAddress}`, {
      ...base,
      reason: 'timeout',
    });
  }

  if (systemCode === 'ECONNREFUSED') {
    return new DialError(`Connection to ${dialAddress} refused`, { ...base, reason: 'refused' });
  }

  if (systemCode !== undefined && isTlsErrorCode(systemCode)) {
    return new DialError(`TLS handshake with ${dialAddress} failed: ${messageOf(error)}`, {
      ...base,
      reason: 'tls',
    });
  }

  return new DialError(`Request to ${dialAddress} failed: ${messageOf(error)}`, { ...base, reason: 'network' });
}

/**
 * Map a failure while draining the response body to a {@link ReadError}
 */
export function mapBodyError(error: unknown, signal?: AbortSignal): DialfetchError {
  if (error instanceof DialfetchError) return error;

  const systemCode = errorCodeOf(error);

  if (signal?.aborted || isAbortError(error)) {
    return new ReadError('Reading the response body was cancelled', {
      reason: 'cancelled',
      systemCode,
      cause: error,
    });
  }

  if (error instanceof undiciErrors.BodyTimeoutError || systemCode === 'UND_ERR_BODY_TIMEOUT') {
    return new ReadError('Timed out reading the response body', { reason: 'timeout', systemCode, cause: error });
  }

  return new ReadError(`Reading the response body failed: ${messageOf(error)}`, {
    reason: 'stream',
    systemCode,
    cause: error,
  });
}
