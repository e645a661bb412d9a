import type { QuickreqError } from '../errors.js';

/** Arguments as they arrive from the command line, before any interpretation. */
export interface RequestInput {
  url: string;
  method?: string;
  data?: string;
  json?: string;
}

export type RequestBody =
  | { kind: 'none' }
  | { kind: 'form'; fields: ReadonlyMap<string, string> }
  | { kind: 'json'; raw: string };

export interface RequestSpec {
  readonly url: string;
  readonly method: string;
  readonly body: RequestBody;
}

export type StageResult<T, E extends QuickreqError = QuickreqError> =
  | { ok: true; value: T }
  | { ok: false; failure: E };

export function success<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function failure<E extends QuickreqError>(error: E): { ok: false; failure: E } {
  return { ok: false, failure: error };
}
