/**
 * Scoped console logger
 * Writes `[scope]`-prefixed lines; structured data is redacted before it is printed.
 */

import type { LogLevel } from '../config/engine-config';

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/** Keys whose values never reach a log line */
const SENSITIVE_KEY = /pass(word|phrase)?|secret|key|token|salt/i;

const REDACTED = '[redacted]';

let threshold: LogLevel = 'info';

/** Set the process-wide level threshold */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Replace sensitive values with a marker, recursing into plain objects.
 * Errors are reduced to their name and message.
 */
export function redact(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_KEY.test(key)) {
      result[key] = REDACTED;
    } else if (value instanceof Error) {
      result[key] = `${value.name}: ${value.message}`;
    } else if (value instanceof Uint8Array) {
      result[key] = `<${value.byteLength} bytes>`;
    } else if (isPlainRecord(value)) {
      result[key] = redact(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function write(level: Exclude<LogLevel, 'silent'>, scope: string, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const line = `${new Date().toISOString()} [${scope}] ${message}`;
  const args: unknown[] = data === undefined ? [line] : [line, redact(data)];

  switch (level) {
    case 'debug':
      console.debug(...args);
      break;
    case 'info':
      console.info(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => write('debug', scope, message, data),
    info: (message, data) => write('info', scope, message, data),
    warn: (message, data) => write('warn', scope, message, data),
    error: (message, data) => write('error', scope, message, data),
  };
}
