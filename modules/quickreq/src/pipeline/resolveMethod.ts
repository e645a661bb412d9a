import type { RequestInput } from './types.js';

export const DEFAULT_METHOD = 'GET';

/**
 * Effective method: a JSON payload always means POST, whatever `-X` said.
 */
export function resolveMethod(input: Pick<RequestInput, 'method' | 'json'>): string {
  if (input.json !== undefined) {
    return 'POST';
  }
  const explicit = input.method?.trim();
  return explicit ? explicit.toUpperCase() : DEFAULT_METHOD;
}
