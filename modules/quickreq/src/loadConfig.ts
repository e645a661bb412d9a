import dotenv from 'dotenv';

import { ConfigError } from './errors.js';
import {
  LOG_LEVELS,
  validateConfigDocument,
  type ConfigDocument,
  type ConfigValidator,
  type SchemaError
} from './config/schema.js';

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggingConfig {
  level?: LogLevel;
  file?: string;
  debugPayloads: boolean;
}

export interface QuickreqConfig {
  timeoutMs?: number;
  userAgent?: string;
  logging: LoggingConfig;
}

export type Environment = Record<string, string | undefined>;

const ENV_NAMES: Record<keyof ConfigDocument, string> = {
  timeoutMs: 'QUICKREQ_TIMEOUT_MS',
  userAgent: 'QUICKREQ_USER_AGENT',
  logLevel: 'QUICKREQ_LOG_LEVEL',
  logFile: 'QUICKREQ_LOG_FILE',
  debugPayloads: 'QUICKREQ_LOG_DEBUG_PAYLOADS'
};

/** Reads `.env` from the working directory into `process.env`. */
export function loadEnvironment(): Environment {
  dotenv.config();
  return process.env;
}

export function loadConfig(
  env: Environment = loadEnvironment(),
  validate: ConfigValidator = validateConfigDocument
): QuickreqConfig {
  const document: ConfigDocument = {
    timeoutMs: parseInteger(readVariable(env, ENV_NAMES.timeoutMs)),
    userAgent: readVariable(env, ENV_NAMES.userAgent),
    logLevel: readVariable(env, ENV_NAMES.logLevel)?.toLowerCase(),
    logFile: readVariable(env, ENV_NAMES.logFile),
    debugPayloads: parseBoolean(readVariable(env, ENV_NAMES.debugPayloads))
  };

  if (!validate(document)) {
    const problems = collectErrors(validate.errors);
    throw new ConfigError(`Configuration is invalid:\n${problems.join('\n')}`, problems);
  }

  return {
    timeoutMs: document.timeoutMs,
    userAgent: document.userAgent,
    logging: {
      level: parseLogLevel(document.logLevel),
      file: document.logFile,
      debugPayloads: document.debugPayloads
    }
  };
}

function readVariable(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

// Non-numeric input becomes NaN so the schema rejects it instead of dropping it.
function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  return /^-?\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
}

function parseBoolean(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  return value === '1' || value.toLowerCase() === 'true';
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

function collectErrors(errors: SchemaError[] | null | undefined): string[] {
  if (!errors?.length) {
    return ['Unknown validation error'];
  }
  return errors.map((err) => `${describePath(err.instancePath)} ${err.message ?? ''}`.trim());
}

function describePath(instancePath: string): string {
  const key = instancePath.replace(/^\//, '');
  const match = Object.entries(ENV_NAMES).find(([field]) => field === key);
  return match ? match[1] : instancePath || '/';
}
