/**
 * Structured logger bound to one service.
 *
 * Adds the service name and an optional request id to every line, drops
 * entries below the configured level, and masks credential-bearing metadata
 * (OAuth tokens, merchant keys, request signatures) before it reaches the sink.
 */

import { log as baseLog, type LogLevel } from './logger.js';

export interface ServiceLoggerConfig {
  /** Service name injected into every log line. */
  service: string;
  /** Minimum log level (default: 'info' in production, 'debug' elsewhere). */
  minLevel?: LogLevel;
  /** Metadata keys to mask; matched case-insensitively as substrings. */
  redactFields?: string[];
}

export interface ServiceLogger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): ServiceLogger;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const DEFAULT_REDACT_FIELDS = [
  'token',
  'secret',
  'password',
  'authorization',
  'cookie',
  'paysign',
  'mch_key'
];

// Wire field names too short to match as substrings.
const EXACT_REDACT_KEYS = new Set(['sign', 'key']);

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redactMetadata(metadata: Record<string, unknown>, redactFields: string[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    const lowered = key.toLowerCase();
    if (EXACT_REDACT_KEYS.has(lowered) || redactFields.some((field) => lowered.includes(field.toLowerCase()))) {
      result[key] = '[REDACTED]';
    } else if (isPlainRecord(value)) {
      result[key] = redactMetadata(value, redactFields);
    } else {
      result[key] = value;
    }
  }
  return result;
}

export function createServiceLogger(config: ServiceLoggerConfig, bindings: Record<string, unknown> = {}): ServiceLogger {
  const env = process.env.NODE_ENV ?? 'development';
  const minLevel = config.minLevel ?? (env === 'production' ? 'info' : 'debug');
  const minLevelOrder = LOG_LEVEL_ORDER[minLevel];
  const redactFields = config.redactFields ?? DEFAULT_REDACT_FIELDS;

  const emit = (level: LogLevel, message: string, metadata?: Record<string, unknown>): void => {
    if (LOG_LEVEL_ORDER[level] < minLevelOrder) return;

    baseLog(level, message, {
      service: config.service,
      ...redactMetadata({ ...bindings, ...metadata }, redactFields)
    });
  };

  return {
    debug: (message, metadata) => emit('debug', message, metadata),
    info: (message, metadata) => emit('info', message, metadata),
    warn: (message, metadata) => emit('warn', message, metadata),
    error: (message, metadata) => emit('error', message, metadata),
    child: (extra) => createServiceLogger(config, { ...bindings, ...extra })
  };
}
