import winston from 'winston';
import { config } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

// ============================================================================
// Sensitive Data Masking
// ============================================================================

/**
 * Patterns for detecting sensitive keys in objects.
 * These are matched case-insensitively.
 */
const SENSITIVE_KEY_PATTERNS = [/password/i, /secret/i, /token/i, /api[_-]?key/i, /cookie/i];

const isSensitiveKey = (key: string): boolean => {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
};

/**
 * Redact a sensitive string value.
 * Shows first 4 characters for debugging while hiding the rest.
 */
const redactSensitiveString = (value: string): string => {
  if (value.length <= 8) {
    return '[REDACTED]';
  }
  return `${value.slice(0, 4)}...[REDACTED]`;
};

/**
 * Recursively mask sensitive values in an object.
 * Returns a new object with sensitive values redacted.
 *
 * @param maxDepth - Maximum recursion depth (default: 5)
 */
export const maskSensitiveData = (obj: unknown, maxDepth: number = 5): unknown => {
  if (maxDepth <= 0) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (obj === null || obj === undefined || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskSensitiveData(item, maxDepth - 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (!isSensitiveKey(key)) {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    } else if (value === null || value === undefined) {
      result[key] = value;
    } else if (typeof value === 'string') {
      result[key] = redactSensitiveString(value);
    } else {
      result[key] = '[REDACTED]';
    }
  }
  return result;
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  const { level, message, timestamp, ...rest } = info;
  const masked = maskSensitiveData(rest);
  return {
    level,
    message,
    timestamp,
    ...(typeof masked === 'object' && masked !== null ? masked : {}),
  };
});

/**
 * Format for structured JSON logging.
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output (used in development).
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, gameId, ...meta }) => {
    const gameStr = typeof gameId === 'string' ? ` [${gameId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${gameStr}: ${String(message)}${metaStr}`;
  })
);

const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: 'checkers-match-server',
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' || config.isProduction ? jsonFormat : consoleFormat,
      silent: config.isTest,
    }),
  ],
});

export { logger };
