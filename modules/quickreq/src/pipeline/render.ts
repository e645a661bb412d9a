import { LosslessNumber, isLosslessNumber, isSafeNumber, parse as parseLossless } from 'lossless-json';

import { HttpStatusError, type QuickreqError } from '../errors.js';
import type { HttpResponse } from '../http/httpClient.js';
import type { RequestInput, RequestSpec } from './types.js';

export type ResponseBody = { kind: 'json'; value: unknown } | { kind: 'text'; text: string };

export interface OutcomeReport {
  stdout: string[];
  stderr: string[];
  status?: number;
  body?: ResponseBody;
  failure?: QuickreqError;
}

const INDENT = '  ';

export function formatRequestLines(url: string, method: string): string[] {
  return [`Requesting URL: ${url}`, `Method: ${method}`];
}

export function formatDiagnostic(url: string, method: string, error: QuickreqError): string {
  return [...formatRequestLines(url, method), `Error: ${error.message}`].join('\n');
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

// Numbers a double cannot hold exactly stay as their source digits.
function parseExactNumber(digits: string): number | LosslessNumber {
  return isSafeNumber(digits) ? Number(digits) : new LosslessNumber(digits);
}

export function classifyResponseBody(text: string): ResponseBody {
  let plain: unknown;
  try {
    plain = JSON.parse(text);
  } catch {
    return { kind: 'text', text };
  }

  try {
    return { kind: 'json', value: parseLossless(text, null, parseExactNumber) };
  } catch {
    // lossless-json rejects duplicate keys; JSON.parse keeps the last one
    return { kind: 'json', value: plain };
  }
}

export function renderResponse(spec: RequestSpec, input: RequestInput, response: HttpResponse): OutcomeReport {
  if (!isSuccessStatus(response.status)) {
    const error = new HttpStatusError(response.status);
    return {
      stdout: [],
      stderr: [formatDiagnostic(spec.url, spec.method, error)],
      status: response.status,
      failure: error
    };
  }

  const header = [...formatRequestLines(spec.url, spec.method), ...echoPayload(spec, input)].join('\n');
  const body = classifyResponseBody(response.body);
  const rendered =
    body.kind === 'json'
      ? `Response body (JSON with sorted keys):\n${stringifySorted(body.value)}`
      : `Response body:\n${body.text}`;

  return {
    stdout: [header, rendered],
    stderr: [],
    status: response.status,
    body
  };
}

function echoPayload(spec: RequestSpec, input: RequestInput): string[] {
  if (spec.method !== 'POST') {
    return [];
  }
  if (spec.body.kind === 'json') {
    return [`JSON: ${spec.body.raw}`];
  }
  return [`Data: ${input.data ?? ''}`];
}

/**
 * Pretty-prints a parsed JSON value with every object's keys in lexicographic
 * order. `JSON.stringify` cannot do this on its own: objects always list
 * integer-like keys first.
 */
export function stringifySorted(value: unknown, depth = 0): string {
  if (isLosslessNumber(value)) {
    return value.toString();
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      return '[]';
    }
    const inner = INDENT.repeat(depth + 1);
    const items = value.map((item) => `${inner}${stringifySorted(item, depth + 1)}`);
    return `[\n${items.join(',\n')}\n${INDENT.repeat(depth)}]`;
  }

  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value).sort(([left], [right]) => compareCodePoints(left, right));
    if (entries.length === 0) {
      return '{}';
    }
    const inner = INDENT.repeat(depth + 1);
    const members = entries.map(
      ([key, member]) => `${inner}${JSON.stringify(key)}: ${stringifySorted(member, depth + 1)}`
    );
    return `{\n${members.join(',\n')}\n${INDENT.repeat(depth)}}`;
  }

  return JSON.stringify(value);
}

// Code point order, which is also UTF-8 byte order. Plain `<` compares UTF-16
// code units and puts astral characters before U+E000..U+FFFF.
export function compareCodePoints(left: string, right: string): number {
  const a = [...left];
  const b = [...right];
  const length = Math.min(a.length, b.length);
  for (let index = 0; index < length; index += 1) {
    const difference = (a[index].codePointAt(0) ?? 0) - (b[index].codePointAt(0) ?? 0);
    if (difference !== 0) {
      return difference;
    }
  }
  return a.length - b.length;
}
