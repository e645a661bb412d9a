export type HttpRequestBody = string | URLSearchParams;

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  body?: HttpRequestBody;
  timeoutMs?: number;
}

export interface HttpResponse<T = string> {
  status: number;
  body: T;
  headers?: Record<string, string>;
}

export interface HttpClient {
  request(method: string, url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}
