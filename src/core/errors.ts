export class DialfetchError extends Error {
  code: string;
  suggestions: string[];
  retriable: boolean;

  constructor(
    message: string,
    code: string,
    suggestions: string[] = [],
    retriable = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DialfetchError';
    this.code = code;
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

/**
 * The URL could not be parsed at all
 */
export class InvalidUrlError extends DialfetchError {
  url: string;

  constructor(url: string, cause?: unknown) {
    super(
      `Invalid URL: ${JSON.stringify(url)}`,
      'INVALID_URL',
      [
        'Include the scheme, e.g. https://example.com/.',
        'Percent-encode spaces and reserved characters.'
      ],
      false,
      { cause }
    );
    this.name = 'InvalidUrlError';
    this.url = url;
  }
}

export class MissingHostError extends DialfetchError {
  url: string;

  constructor(url: string) {
    super(
      `URL missing host: ${JSON.stringify(url)}`,
      'MISSING_HOST',
      ['Use an absolute URL with a host, e.g. https://example.com/path.'],
      false
    );
    this.name = 'MissingHostError';
    this.url = url;
  }
}

export class UnknownSchemeError extends DialfetchError {
  scheme: string;

  constructor(scheme: string) {
    super(
      `Unknown URL scheme ${JSON.stringify(scheme)}`,
      'UNKNOWN_SCHEME',
      [
        'Use http:// or https://.',
        'Or give an explicit port, e.g. custom://host:8080/.'
      ],
      false
    );
    this.name = 'UnknownSchemeError';
    this.scheme = scheme;
  }
}

/**
 * The request could not be assembled from a resolved target
 */
export class RequestBuildError extends DialfetchError {
  constructor(message: string, cause?: unknown) {
    super(message, 'REQUEST_BUILD', ['Check the request headers and URL scheme.'], false, { cause });
    this.name = 'RequestBuildError';
  }
}

export type DialFailureReason = 'timeout' | 'refused' | 'tls' | 'cancelled' | 'network';

/**
 * Failure anywhere between opening the connection and receiving response headers
 */
export class DialError extends DialfetchError {
  reason: DialFailureReason;
  dialAddress?: string;
  systemCode?: string;

  constructor(
    message: string,
    options: {
      reason: DialFailureReason;
      dialAddress?: string;
      systemCode?: string;
      cause?: unknown;
    }
  ) {
    const reasonSuggestions: Record<DialFailureReason, string[]> = {
      timeout: [
        'Confirm the dial address is reachable from this network.',
        'Raise the connect timeout if the path is slow.'
      ],
      refused: [
        'Confirm a server listens on the dial address and port.',
        'Check that the override address is the intended one.'
      ],
      tls: [
        'The certificate presented at the dial address does not validate for the URL host.',
        'Check that the override points at a server that serves this hostname.'
      ],
      cancelled: ['The fetch was cancelled before a response arrived.'],
      network: ['Check network connectivity and firewall rules.']
    };

    super(
      message,
      'DIAL_FAILURE',
      reasonSuggestions[options.reason],
      options.reason === 'timeout' || options.reason === 'network',
      { cause: options.cause }
    );
    this.name = 'DialError';
    this.reason = options.reason;
    this.dialAddress = options.dialAddress;
    this.systemCode = options.systemCode;
  }
}

export type ReadFailureReason = 'cancelled' | 'timeout' | 'stream';

export class ReadError extends DialfetchError {
  reason: ReadFailureReason;
  systemCode?: string;

  constructor(
    message: string,
    options: { reason: ReadFailureReason; systemCode?: string; cause?: unknown }
  ) {
    super(
      message,
      'READ_FAILURE',
      ['The connection failed while the response body was being read.'],
      options.reason !== 'cancelled',
      { cause: options.cause }
    );
    this.name = 'ReadError';
    this.reason = options.reason;
    this.systemCode = options.systemCode;
  }
}

/**
 * Error thrown when an operation is not valid in the current fetch state
 */
export class StateError extends DialfetchError {
  expectedState?: string;
  actualState?: string;

  constructor(
    message: string,
    options?: {
      expectedState?: string;
      actualState?: string;
    }
  ) {
    super(message, 'STATE_ERROR', ['This is a bug in the fetch lifecycle; please report it.'], false);
    this.name = 'StateError';
    this.expectedState = options?.expectedState;
    this.actualState = options?.actualState;
  }
}
