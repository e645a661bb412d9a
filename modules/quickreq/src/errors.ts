export type UrlErrorKind =
  | 'INVALID_PROTOCOL'
  | 'RELATIVE_WITHOUT_BASE'
  | 'INVALID_PORT'
  | 'INVALID_IPV4'
  | 'INVALID_IPV6'
  | 'PARSE_ERROR';

export type TransportErrorClassification = 'CONNECT' | 'TIMEOUT' | 'OTHER';

export type ErrorKind =
  | 'URL'
  | 'TRANSPORT'
  | 'HTTP_STATUS'
  | 'INVALID_JSON_PAYLOAD'
  | 'CONFIG';

export interface QuickreqErrorOptions {
  cause?: unknown;
}

export class QuickreqError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    options: QuickreqErrorOptions = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
  }
}

const URL_ERROR_MESSAGES: Record<UrlErrorKind, string> = {
  INVALID_PROTOCOL: 'The URL does not have a valid base protocol.',
  RELATIVE_WITHOUT_BASE: 'The URL does not have a valid base protocol.',
  INVALID_PORT: 'The URL contains an invalid port number.',
  INVALID_IPV4: 'The URL contains an invalid IPv4 address.',
  INVALID_IPV6: 'The URL contains an invalid IPv6 address.',
  PARSE_ERROR: 'Some error occurred while parsing the URL.'
};

export class UrlError extends QuickreqError {
  constructor(
    public readonly urlKind: UrlErrorKind,
    options: QuickreqErrorOptions = {}
  ) {
    super(URL_ERROR_MESSAGES[urlKind], 'URL', options);
  }
}

export const UNREACHABLE_MESSAGE =
  'Unable to connect to the server. Perhaps the network is offline or the server hostname cannot be resolved.';

export class TransportError extends QuickreqError {
  constructor(
    public readonly classification: TransportErrorClassification,
    public readonly detail: string,
    options: QuickreqErrorOptions = {}
  ) {
    super(
      classification === 'OTHER' ? `An unexpected error occurred: ${detail}` : UNREACHABLE_MESSAGE,
      'TRANSPORT',
      options
    );
  }

  /** Connection and timeout failures share the "server unreachable" wording. */
  get unreachable(): boolean {
    return this.classification !== 'OTHER';
  }
}

export class HttpStatusError extends QuickreqError {
  constructor(public readonly status: number) {
    super(`Request failed with status code: ${status}`, 'HTTP_STATUS');
  }
}

/**
 * Raised for a malformed `--json` argument. Unlike every other failure this one
 * is not reported and swallowed: it escapes the pipeline and the process exits
 * non-zero.
 */
export class InvalidJsonPayloadError extends QuickreqError {
  constructor(
    public readonly payload: string,
    options: QuickreqErrorOptions = {}
  ) {
    super(`Invalid JSON format: ${payload}`, 'INVALID_JSON_PAYLOAD', options);
  }
}

export class ConfigError extends QuickreqError {
  constructor(
    message: string,
    public readonly problems: string[] = []
  ) {
    super(message, 'CONFIG');
  }
}

export function isQuickreqError(error: unknown): error is QuickreqError {
  return error instanceof QuickreqError;
}
