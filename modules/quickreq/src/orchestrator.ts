import type { QuickreqConfig } from './loadConfig.js';
import type { HttpClient } from './http/httpClient.js';
import type { Logger } from './logger.js';
import type { Output } from './output.js';
import { buildRequestSpec } from './pipeline/encodeBody.js';
import { dispatch } from './pipeline/dispatch.js';
import { formatDiagnostic, formatRequestLines, renderResponse, type OutcomeReport } from './pipeline/render.js';
import { resolveMethod } from './pipeline/resolveMethod.js';
import type { RequestInput } from './pipeline/types.js';
import { validateUrl } from './pipeline/validateUrl.js';

export interface OrchestratorDependencies {
  httpClient: HttpClient;
  logger: Logger;
  output: Output;
}

export interface Orchestrator {
  /**
   * Runs one request through validate → resolve → encode → dispatch → render
   * and writes the report. Resolves for every reported outcome; rejects only
   * with an `InvalidJsonPayloadError`.
   */
  execute: (input: RequestInput) => Promise<OutcomeReport>;
}

export function createOrchestrator(
  config: Pick<QuickreqConfig, 'timeoutMs' | 'userAgent'>,
  deps: OrchestratorDependencies
): Orchestrator {
  const { httpClient, logger, output } = deps;

  return {
    async execute(input) {
      const method = resolveMethod(input);

      const validated = validateUrl(input.url);
      if (!validated.ok) {
        logger.warn({
          message: 'URL rejected',
          metadata: { url: input.url, kind: validated.failure.urlKind }
        });
        return report(output, {
          stdout: [],
          stderr: [formatDiagnostic(input.url, method, validated.failure)],
          failure: validated.failure
        });
      }
      logger.debug({ message: 'URL validated', metadata: { url: input.url, method } });

      const built = buildRequestSpec(input, method);
      if (!built.ok) {
        output.stderr([...formatRequestLines(input.url, method), `JSON: ${built.failure.payload}`].join('\n'));
        logger.error({ message: 'Invalid JSON payload', metadata: { url: input.url, json: built.failure.payload } });
        throw built.failure;
      }
      const spec = built.value;
      logger.debug({ message: 'Request encoded', metadata: { bodyKind: spec.body.kind } });

      const dispatched = await dispatch(spec, httpClient, {
        timeoutMs: config.timeoutMs,
        userAgent: config.userAgent
      });
      if (!dispatched.ok) {
        logger.warn({
          message: 'Transport failure',
          metadata: {
            url: spec.url,
            classification: dispatched.failure.classification,
            detail: dispatched.failure.detail
          }
        });
        return report(output, {
          stdout: [],
          stderr: [formatDiagnostic(spec.url, spec.method, dispatched.failure)],
          failure: dispatched.failure
        });
      }
      logger.info({
        message: 'Response received',
        metadata: { url: spec.url, method: spec.method, status: dispatched.value.status }
      });

      return report(output, renderResponse(spec, input, dispatched.value));
    }
  };
}

function report(output: Output, outcome: OutcomeReport): OutcomeReport {
  outcome.stdout.forEach((text) => output.stdout(text));
  outcome.stderr.forEach((text) => output.stderr(text));
  return outcome;
}
