import Ajv, { type JSONSchemaType, type ValidateFunction, type ErrorObject } from 'ajv/dist/2020.js';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

/** Environment settings after string parsing, before validation. */
export interface ConfigDocument {
  timeoutMs?: number;
  userAgent?: string;
  logLevel?: string;
  logFile?: string;
  debugPayloads: boolean;
}

// setTimeout clamps anything above this to 1ms
export const MAX_TIMEOUT_MS = 2_147_483_647;

const configDocumentSchema: JSONSchemaType<ConfigDocument> = {
  type: 'object',
  additionalProperties: false,
  required: ['debugPayloads'],
  properties: {
    timeoutMs: { type: 'integer', minimum: 1, maximum: MAX_TIMEOUT_MS, nullable: true },
    userAgent: { type: 'string', minLength: 1, nullable: true },
    logLevel: { type: 'string', enum: [...LOG_LEVELS], nullable: true },
    logFile: { type: 'string', minLength: 1, nullable: true },
    debugPayloads: { type: 'boolean' }
  }
};

const ajv = new Ajv({ allErrors: true, strict: false });

export const validateConfigDocument = ajv.compile(configDocumentSchema);

export type ConfigValidator = ValidateFunction<ConfigDocument>;
export type SchemaError = ErrorObject;
