import type { TransportError } from '../errors.js';
import type { HttpClient, HttpResponse } from '../http/httpClient.js';
import { toTransportError } from '../http/transportErrors.js';
import { encodeBody } from './encodeBody.js';
import { failure, success, type RequestSpec, type StageResult } from './types.js';

export interface DispatchOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export async function dispatch(
  spec: RequestSpec,
  client: HttpClient,
  options: DispatchOptions = {}
): Promise<StageResult<HttpResponse, TransportError>> {
  const { headers = {}, body } = encodeBody(spec);
  if (options.userAgent) {
    headers['User-Agent'] = options.userAgent;
  }

  try {
    const response = await client.request(spec.method, spec.url, {
      headers,
      body,
      timeoutMs: options.timeoutMs
    });
    return success(response);
  } catch (error) {
    return failure(toTransportError(error));
  }
}
