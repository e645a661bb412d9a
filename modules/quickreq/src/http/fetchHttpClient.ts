import type { HttpClient, HttpRequestOptions, HttpResponse } from './httpClient.js';
import { toTransportError } from './transportErrors.js';

export class FetchHttpClient implements HttpClient {
  async request(method: string, url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const controller = new AbortController();
    let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

    if (options.timeoutMs && options.timeoutMs > 0) {
      timeoutHandle = setTimeout(() => controller.abort(), options.timeoutMs);
    }

    try {
      const headers: Record<string, string> = { ...(options.headers ?? {}) };
      const response = await fetch(url, {
        method,
        headers,
        body: options.body,
        signal: controller.signal
      });
      // Draining the body is the second await; a failure here is a transport
      // failure too.
      const rawBody = await response.text();
      const responseHeaders = Object.fromEntries(response.headers.entries());

      return {
        status: response.status,
        body: rawBody,
        headers: responseHeaders
      };
    } catch (error) {
      throw toTransportError(error);
    } finally {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
    }
  }
}
