import { UrlError, type UrlErrorKind } from '../errors.js';
import { failure, success, type StageResult } from './types.js';

const SUPPORTED_PREFIXES = ['http://', 'https://'];
const MAX_PORT = 65535;

export function hasSupportedProtocol(raw: string): boolean {
  return SUPPORTED_PREFIXES.some((prefix) => raw.startsWith(prefix));
}

export function validateUrl(raw: string): StageResult<URL, UrlError> {
  if (!hasSupportedProtocol(raw)) {
    return failure(new UrlError('INVALID_PROTOCOL'));
  }

  try {
    return success(new URL(raw));
  } catch (error) {
    return failure(new UrlError(classifyUrlParseFailure(raw), { cause: error }));
  }
}

/**
 * The WHATWG parser only reports "Invalid URL", so the failing component is
 * found by parsing the authority's parts on their own. The host is checked
 * before the port, in the order the parser reaches them.
 */
export function classifyUrlParseFailure(raw: string): UrlErrorKind {
  const scheme = /^[a-zA-Z][a-zA-Z0-9+.-]*:/.exec(raw);
  if (!scheme) {
    return 'RELATIVE_WITHOUT_BASE';
  }

  const { host, port } = splitAuthority(raw.slice(scheme[0].length));

  if (host.startsWith('[')) {
    if (!host.endsWith(']') || !isParsableHost(host)) {
      return 'INVALID_IPV6';
    }
  } else if (endsInNumber(host) && !isParsableHost(host)) {
    return 'INVALID_IPV4';
  }

  if (port !== undefined && port.length > 0 && !isValidPort(port)) {
    return 'INVALID_PORT';
  }

  return 'PARSE_ERROR';
}

function splitAuthority(rest: string): { host: string; port?: string } {
  const withoutSlashes = rest.replace(/^[/\\]+/, '');
  const end = withoutSlashes.search(/[/\\?#]/);
  const authority = end === -1 ? withoutSlashes : withoutSlashes.slice(0, end);
  const hostAndPort = authority.slice(authority.lastIndexOf('@') + 1);

  if (hostAndPort.startsWith('[')) {
    const close = hostAndPort.indexOf(']');
    if (close === -1) {
      return { host: hostAndPort };
    }
    const remainder = hostAndPort.slice(close + 1);
    if (remainder.length > 0 && !remainder.startsWith(':')) {
      // `[::1]x` never closes the bracketed host as far as the parser is concerned
      return { host: hostAndPort };
    }
    return {
      host: hostAndPort.slice(0, close + 1),
      port: remainder.length > 0 ? remainder.slice(1) : undefined
    };
  }

  const colon = hostAndPort.indexOf(':');
  if (colon === -1) {
    return { host: hostAndPort };
  }
  return { host: hostAndPort.slice(0, colon), port: hostAndPort.slice(colon + 1) };
}

// A host whose last label is numeric is handed to the IPv4 parser.
function endsInNumber(host: string): boolean {
  const labels = host.split('.');
  if (labels.length > 1 && labels[labels.length - 1] === '') {
    labels.pop();
  }
  const last = labels[labels.length - 1] ?? '';
  return /^\d+$/.test(last) || /^0x[0-9a-f]*$/i.test(last);
}

function isParsableHost(host: string): boolean {
  try {
    new URL(`http://${host}/`);
    return true;
  } catch {
    return false;
  }
}

function isValidPort(port: string): boolean {
  return /^\d+$/.test(port) && Number(port) <= MAX_PORT;
}
