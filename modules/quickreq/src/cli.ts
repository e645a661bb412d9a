import yargs from 'yargs';

import { FetchHttpClient } from './http/fetchHttpClient.js';
import type { HttpClient } from './http/httpClient.js';
import { loadConfig, type QuickreqConfig } from './loadConfig.js';
import { createLogger, type Logger } from './logger.js';
import { createOrchestrator } from './orchestrator.js';
import { consoleOutput, type Output } from './output.js';
import type { OutcomeReport } from './pipeline/render.js';
import type { RequestInput } from './pipeline/types.js';
import { DEFAULT_METHOD } from './pipeline/resolveMethod.js';

export function parseArguments(argv: string[]): RequestInput {
  const args = yargs(argv)
    .scriptName('quickreq')
    .usage('$0 <url> [options]\n\nSend one HTTP request and print the response')
    // a repeated flag keeps its last value instead of becoming an array
    .parserConfiguration({ 'parse-positional-numbers': false, 'duplicate-arguments-array': false })
    .demandCommand(1, 1, 'A URL is required', 'Only one URL may be given')
    .option('method', {
      alias: 'X',
      describe: 'HTTP method',
      type: 'string',
      default: DEFAULT_METHOD
    })
    .option('data', {
      alias: 'd',
      describe: 'Form body for POST requests, as key=value&key2=value2',
      type: 'string'
    })
    .option('json', {
      describe: 'Raw JSON body; forces the method to POST',
      type: 'string'
    })
    .strictOptions()
    .help()
    .parseSync();

  return {
    url: String(args._[0]),
    method: args.method,
    data: args.data,
    json: args.json
  };
}

export interface RunDependencies {
  config: QuickreqConfig;
  httpClient: HttpClient;
  logger: Logger;
  output: Output;
}

export async function run(argv: string[], overrides: Partial<RunDependencies> = {}): Promise<OutcomeReport> {
  const input = parseArguments(argv);
  const config = overrides.config ?? loadConfig();
  const orchestrator = createOrchestrator(config, {
    httpClient: overrides.httpClient ?? new FetchHttpClient(),
    logger: overrides.logger ?? createLogger(config.logging),
    output: overrides.output ?? consoleOutput
  });

  return orchestrator.execute(input);
}
