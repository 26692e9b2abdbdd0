/**
 * tidings — Logging Utilities
 *
 * Structured logging using Pino with redaction of sensitive fields
 * and consistent formatting.
 *
 * @module kernel/logger
 * @version 1.0.0
 */

import pino from 'pino';
import { getConfig } from '../config/config.js';

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export type Logger = pino.Logger;

/** Loggers whose level follows the configuration rather than LOG_LEVEL or an explicit option. */
const configLevelLoggers: Logger[] = [];

export function createLogger(name: string, options?: { level?: string }): Logger {
  const config = getConfig();

  const opts: pino.LoggerOptions = {
    name: `tidings:${name}`,
    level: options?.level ?? process.env.LOG_LEVEL ?? config.logging.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  const logger = pino(opts);
  if (options?.level === undefined && process.env.LOG_LEVEL === undefined) {
    configLevelLoggers.push(logger);
  }
  return logger;
}

/**
 * Apply `logging.level` from a configuration loaded after the modules
 * created their loggers. LOG_LEVEL and explicit levels still win.
 */
export function setLogLevel(level: string): void {
  for (const logger of configLevelLoggers) {
    logger.level = level;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

const SENSITIVE_FIELDS = [
  'password',
  'secret',
  'token',
  'key',
  'auth',
  'credential',
];

export function redact<T extends Record<string, unknown>>(
  obj: T,
  additionalFields: string[] = [],
): Record<string, unknown> {
  const fieldsToRedact = [...SENSITIVE_FIELDS, ...additionalFields];
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (fieldsToRedact.some((field) => lowerKey.includes(field))) {
      result[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      result[key] = redact(value, additionalFields);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatError(error: unknown): {
  message: string;
  stack?: string;
  code?: string;
  name?: string;
} {
  if (error instanceof Error) {
    const result: { message: string; stack?: string; code?: string; name?: string } = {
      message: error.message,
      name: error.name,
    };
    if (error.stack !== undefined) {
      result.stack = error.stack;
    }
    if ('code' in error && typeof error.code === 'string') {
      result.code = error.code;
    }
    return result;
  }

  return { message: String(error) };
}
