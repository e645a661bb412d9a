import { InvalidJsonPayloadError } from '../errors.js';
import type { HttpRequestOptions } from '../http/httpClient.js';
import { failure, success, type RequestBody, type RequestInput, type RequestSpec, type StageResult } from './types.js';

/**
 * Splits `key=value&key2=value2` into a map. Only the first `=` separates key
 * from value, pairs without one are dropped and a repeated key keeps its last
 * value.
 */
export function parseFormData(data: string): Map<string, string> {
  const fields = new Map<string, string>();
  for (const pair of data.split('&')) {
    const separator = pair.indexOf('=');
    if (separator === -1) {
      continue;
    }
    fields.set(pair.slice(0, separator), pair.slice(separator + 1));
  }
  return fields;
}

export function isWellFormedJson(raw: string): boolean {
  try {
    JSON.parse(raw);
    return true;
  } catch {
    return false;
  }
}

export function buildRequestSpec(
  input: RequestInput,
  method: string
): StageResult<RequestSpec, InvalidJsonPayloadError> {
  const body = selectBody(input, method);
  if (body.kind === 'json' && !isWellFormedJson(body.raw)) {
    return failure(new InvalidJsonPayloadError(body.raw));
  }
  return success(Object.freeze({ url: input.url, method, body }));
}

function selectBody(input: RequestInput, method: string): RequestBody {
  if (input.json !== undefined) {
    return { kind: 'json', raw: input.json };
  }
  if (input.data !== undefined && method === 'POST') {
    return { kind: 'form', fields: parseFormData(input.data) };
  }
  return { kind: 'none' };
}

/** Turns a request's body into what the transport sends. */
export function encodeBody(spec: RequestSpec): Pick<HttpRequestOptions, 'headers' | 'body'> {
  switch (spec.body.kind) {
    case 'json':
      return { headers: { 'Content-Type': 'application/json' }, body: spec.body.raw };
    case 'form':
      // fetch adds the application/x-www-form-urlencoded content type itself
      return { headers: {}, body: new URLSearchParams([...spec.body.fields]) };
    case 'none':
      return { headers: {} };
  }
}
