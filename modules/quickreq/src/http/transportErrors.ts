import { TransportError, type TransportErrorClassification } from '../errors.js';

// Codes raised by Node's net/dns layer and by undici while the connection is
// being established.
const CONNECT_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'EHOSTDOWN',
  'ENETUNREACH',
  'ENETDOWN',
  'UND_ERR_CONNECT_TIMEOUT'
]);

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);
const TIMEOUT_NAMES = new Set(['AbortError', 'TimeoutError']);

const MAX_CAUSE_DEPTH = 8;

export function classifyTransportError(error: unknown): TransportErrorClassification {
  for (const candidate of walkCauses(error)) {
    const code = readCode(candidate);
    if (code && CONNECT_CODES.has(code)) {
      return 'CONNECT';
    }
    if ((code && TIMEOUT_CODES.has(code)) || TIMEOUT_NAMES.has(readName(candidate) ?? '')) {
      return 'TIMEOUT';
    }
  }
  return 'OTHER';
}

export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  return new TransportError(classifyTransportError(error), describeError(error), { cause: error });
}

/**
 * Joins the messages along the cause chain, e.g. `fetch failed: other side closed`.
 */
export function describeError(error: unknown): string {
  const messages: string[] = [];
  let current: unknown = error;
  let depth = 0;
  while (current !== undefined && current !== null && depth < MAX_CAUSE_DEPTH) {
    const message = current instanceof Error ? current.message : String(current);
    if (message && !messages.includes(message)) {
      messages.push(message);
    }
    current = readCause(current);
    depth += 1;
  }
  return messages.length > 0 ? messages.join(': ') : 'unknown error';
}

function* walkCauses(error: unknown): Generator<unknown> {
  const queue: Array<{ value: unknown; depth: number }> = [{ value: error, depth: 0 }];
  const seen = new Set<unknown>();

  while (queue.length > 0) {
    const next = queue.shift();
    if (!next || next.value === undefined || next.value === null || seen.has(next.value)) {
      continue;
    }
    seen.add(next.value);
    yield next.value;

    if (next.depth >= MAX_CAUSE_DEPTH) {
      continue;
    }
    const cause = readCause(next.value);
    if (cause !== undefined) {
      queue.push({ value: cause, depth: next.depth + 1 });
    }
    if (next.value instanceof AggregateError) {
      for (const member of next.value.errors) {
        queue.push({ value: member, depth: next.depth + 1 });
      }
    }
  }
}

function readCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

function readName(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string') {
    return value.name;
  }
  return undefined;
}

function readCause(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && 'cause' in value) {
    return value.cause;
  }
  return undefined;
}
