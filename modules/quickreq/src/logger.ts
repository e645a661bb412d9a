import fs from 'node:fs';
import path from 'node:path';

import { LOG_LEVELS } from './config/schema.js';
import type { LoggingConfig, LogLevel } from './loadConfig.js';

export interface LogRecord {
  level: LogLevel;
  message: string;
  metadata?: Record<string, unknown>;
}

type LogInput = Omit<LogRecord, 'level'>;

export interface Logger {
  debug: (record: LogInput) => void;
  info: (record: LogInput) => void;
  warn: (record: LogInput) => void;
  error: (record: LogInput) => void;
}

// Request and response content stays out of the log unless debug payloads are on.
const SENSITIVE_KEY_PATTERNS = [/body/i, /payload/i, /^json$/i, /^data$/i];

const DEFAULT_FILE_THRESHOLD: LogLevel = 'info';

/**
 * Logging is off unless a level or a file is configured, since stdout belongs
 * to the report. Without a file, records go to stderr.
 */
export function createLogger(config: LoggingConfig = { debugPayloads: false }): Logger {
  const threshold = config.level ?? (config.file ? DEFAULT_FILE_THRESHOLD : undefined);
  if (config.file) {
    ensureLogDirectory(config.file);
  }

  const log = (level: LogLevel) => (record: LogInput) => {
    if (threshold === undefined || !shouldLog(level, threshold)) {
      return;
    }
    emit({ ...record, level }, config);
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error')
  };
}

function emit(record: LogRecord, config: LoggingConfig): void {
  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    ...record,
    metadata: sanitizeMetadata(record.metadata, config.debugPayloads)
  });

  if (!config.file) {
    console.error(line);
    return;
  }

  try {
    fs.appendFileSync(config.file, `${line}\n`, { encoding: 'utf-8' });
  } catch (error) {
    console.error('Failed to write log file', error);
  }
}

function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(threshold);
}

function sanitizeMetadata(
  metadata: Record<string, unknown> | undefined,
  debugPayloads: boolean
): Record<string, unknown> | undefined {
  if (!metadata || debugPayloads) {
    return metadata;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    sanitized[key] = isSensitiveKey(key) ? '[redacted]' : value;
  }
  return sanitized;
}

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

function ensureLogDirectory(logPath: string): void {
  try {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
  } catch (error) {
    console.error('Failed to initialize log file', error);
  }
}
