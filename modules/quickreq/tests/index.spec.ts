import { ConfigError } from '../src/errors.js';
import { main, reportFatal } from '../src/index.js';

describe('entry point', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('aborts with exit code 1 on a malformed JSON payload', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const fetchSpy = jest.spyOn(globalThis, 'fetch');
    const exit = jest.fn();

    await main(['https://example.com', '--json', '{bad}']).catch((error: unknown) => reportFatal(error, exit));

    expect(exit).toHaveBeenCalledWith(1);
    expect(fetchSpy).not.toHaveBeenCalled();
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy.mock.calls).toEqual([
      ['Requesting URL: https://example.com\nMethod: POST\nJSON: {bad}'],
      ['Invalid JSON format: {bad}']
    ]);
  });

  it('prints configuration problems and exits 1', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const exit = jest.fn();

    reportFatal(new ConfigError('Configuration is invalid:\nQUICKREQ_TIMEOUT_MS must be >= 1'), exit);

    expect(errorSpy).toHaveBeenCalledWith('Configuration is invalid:\nQUICKREQ_TIMEOUT_MS must be >= 1');
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('prints unexpected errors with a prefix', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const exit = jest.fn();
    const boom = new Error('boom');

    reportFatal(boom, exit);

    expect(errorSpy).toHaveBeenCalledWith('quickreq failed', boom);
    expect(exit).toHaveBeenCalledWith(1);
  });
});
