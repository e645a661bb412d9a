import { InvalidJsonPayloadError, TransportError, UNREACHABLE_MESSAGE, UrlError } from '../src/errors.js';
import type { HttpClient, HttpRequestOptions, HttpResponse } from '../src/http/httpClient.js';
import { createLogger } from '../src/logger.js';
import { createOrchestrator } from '../src/orchestrator.js';
import type { Output } from '../src/output.js';

class StubHttpClient implements HttpClient {
  public readonly calls: Array<{ method: string; url: string; options: HttpRequestOptions }> = [];

  constructor(private readonly outcome: HttpResponse | Error) {}

  async request(method: string, url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    this.calls.push({ method, url, options });
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }
}

class CapturingOutput implements Output {
  public readonly out: string[] = [];
  public readonly err: string[] = [];

  stdout = (text: string): void => {
    this.out.push(text);
  };

  stderr = (text: string): void => {
    this.err.push(text);
  };
}

function setup(outcome: HttpResponse | Error, config: { timeoutMs?: number; userAgent?: string } = {}) {
  const httpClient = new StubHttpClient(outcome);
  const output = new CapturingOutput();
  const orchestrator = createOrchestrator(config, { httpClient, output, logger: createLogger() });
  return { httpClient, output, orchestrator };
}

describe('orchestrator', () => {
  it('GETs a URL and prints the JSON response with sorted keys', async () => {
    const { httpClient, output, orchestrator } = setup({ status: 200, body: '{"b":1,"a":2}' });

    const report = await orchestrator.execute({ url: 'https://example.com', method: 'GET' });

    expect(httpClient.calls).toEqual([
      { method: 'GET', url: 'https://example.com', options: { headers: {}, body: undefined, timeoutMs: undefined } }
    ]);
    expect(output.out).toEqual([
      'Requesting URL: https://example.com\nMethod: GET',
      'Response body (JSON with sorted keys):\n{\n  "a": 2,\n  "b": 1\n}'
    ]);
    expect(output.err).toEqual([]);
    expect(report.status).toBe(200);
  });

  it('forces POST and sends the JSON payload verbatim', async () => {
    const { httpClient, output, orchestrator } = setup({ status: 200, body: 'accepted' });

    await orchestrator.execute({ url: 'https://example.com', method: 'GET', json: '{"x":1}' });

    expect(httpClient.calls).toHaveLength(1);
    expect(httpClient.calls[0].method).toBe('POST');
    expect(httpClient.calls[0].options.headers).toEqual({ 'Content-Type': 'application/json' });
    expect(httpClient.calls[0].options.body).toBe('{"x":1}');
    expect(output.out).toEqual([
      'Requesting URL: https://example.com\nMethod: POST\nJSON: {"x":1}',
      'Response body:\naccepted'
    ]);
  });

  it('aborts on malformed JSON without touching the network', async () => {
    const { httpClient, output, orchestrator } = setup({ status: 200, body: '' });

    await expect(orchestrator.execute({ url: 'https://example.com', json: '{bad}' })).rejects.toThrow(
      InvalidJsonPayloadError
    );

    expect(httpClient.calls).toHaveLength(0);
    expect(output.err).toEqual(['Requesting URL: https://example.com\nMethod: POST\nJSON: {bad}']);
    expect(output.out).toEqual([]);
  });

  it('reports an unsupported protocol without touching the network', async () => {
    const { httpClient, output, orchestrator } = setup({ status: 200, body: '' });

    const report = await orchestrator.execute({ url: 'ftp://example.com', method: 'GET' });

    expect(httpClient.calls).toHaveLength(0);
    expect(output.err).toEqual([
      'Requesting URL: ftp://example.com\nMethod: GET\nError: The URL does not have a valid base protocol.'
    ]);
    expect(report.failure).toBeInstanceOf(UrlError);
    expect(report.status).toBeUndefined();
  });

  it('shows the effective method in a URL diagnostic', async () => {
    const { output, orchestrator } = setup({ status: 200, body: '' });

    await orchestrator.execute({ url: 'http://example.com:99999', method: 'get', json: '{}' });

    expect(output.err).toEqual([
      'Requesting URL: http://example.com:99999\nMethod: POST\nError: The URL contains an invalid port number.'
    ]);
  });

  it('posts form data and echoes the raw data string', async () => {
    const { httpClient, output, orchestrator } = setup({ status: 200, body: '{"ok":true}' });

    await orchestrator.execute({ url: 'https://example.com/form', method: 'post', data: 'a=1&bad&a=2&b=x=y' });

    const body = httpClient.calls[0].options.body;
    expect(body).toBeInstanceOf(URLSearchParams);
    expect(String(body)).toBe('a=2&b=x%3Dy');
    expect(output.out[0]).toBe('Requesting URL: https://example.com/form\nMethod: POST\nData: a=1&bad&a=2&b=x=y');
  });

  it('reports an unreachable server', async () => {
    const refused = new TypeError('fetch failed', {
      cause: Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9'), { code: 'ECONNREFUSED' })
    });
    const { output, orchestrator } = setup(refused);

    const report = await orchestrator.execute({ url: 'http://127.0.0.1:9', method: 'GET' });

    expect(output.err).toEqual([`Requesting URL: http://127.0.0.1:9\nMethod: GET\nError: ${UNREACHABLE_MESSAGE}`]);
    expect(report.failure).toBeInstanceOf(TransportError);
  });

  it('reports any other transport failure with its detail', async () => {
    const { output, orchestrator } = setup(new Error('socket hang up'));

    await orchestrator.execute({ url: 'https://example.com', method: 'GET' });

    expect(output.err).toEqual([
      'Requesting URL: https://example.com\nMethod: GET\nError: An unexpected error occurred: socket hang up'
    ]);
  });

  it('reports a non-2xx status and skips the body', async () => {
    const { output, orchestrator } = setup({ status: 404, body: 'not here' });

    const report = await orchestrator.execute({ url: 'https://example.com/missing', method: 'GET' });

    expect(output.out).toEqual([]);
    expect(output.err).toEqual([
      'Requesting URL: https://example.com/missing\nMethod: GET\nError: Request failed with status code: 404'
    ]);
    expect(report.status).toBe(404);
  });

  it('passes the configured timeout and user agent to the client', async () => {
    const { httpClient, orchestrator } = setup({ status: 204, body: '' }, { timeoutMs: 1500, userAgent: 'quickreq-test' });

    await orchestrator.execute({ url: 'https://example.com', method: 'DELETE' });

    expect(httpClient.calls[0]).toEqual({
      method: 'DELETE',
      url: 'https://example.com',
      options: { headers: { 'User-Agent': 'quickreq-test' }, body: undefined, timeoutMs: 1500 }
    });
  });
});
