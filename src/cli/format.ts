import {
  DialError,
  InvalidUrlError,
  MissingHostError,
  ReadError,
  RequestBuildError,
  UnknownSchemeError,
} from '../core/errors.js';
import type { FetchResult } from '../types/index.js';
import { createColors, type Colors } from '../utils/colors.js';
import { headerEntries } from '../utils/headers.js';

const plain = createColors(false);

/**
 * Status, protocol, every header value and the body length, one per line
 */
export function formatResult(result: FetchResult, colors: Colors = plain): string {
  const lines = [
    `${colors.bold('Status:')} ${result.statusLine}`,
    `${colors.bold('Protocol:')} ${result.protocol}`,
    colors.bold('Headers:'),
    ...headerEntries(result.headers).map(([name, value]) => `  ${colors.cyan(name)}: ${value}`),
    `${colors.bold('Body length:')} ${result.bodyLength} bytes`,
  ];
  return lines.join('\n') + '\n';
}

function describeFailure(error: unknown): string {
  if (error instanceof InvalidUrlError) {
    const cause = error.cause instanceof Error ? error.cause.message : error.message;
    return `parsing url failed: ${cause}`;
  }
  if (error instanceof MissingHostError) return `url missing host: ${JSON.stringify(error.url)}`;
  if (error instanceof UnknownSchemeError) return `unknown url scheme ${JSON.stringify(error.scheme)}`;
  if (error instanceof RequestBuildError) return `building request failed: ${error.message}`;
  if (error instanceof DialError) return `request failed: ${error.message}`;
  if (error instanceof ReadError) return `read failed: ${error.message}`;
  return `unexpected error: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Single diagnostic line for a failed fetch
 */
export function formatFailure(error: unknown, colors: Colors = plain): string {
  return colors.red(describeFailure(error));
}
