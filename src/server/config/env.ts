/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables and
 * the helpers used to validate them at startup.
 *
 * All environment variables should be defined here with appropriate
 * validation rules and defaults.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

/**
 * Node environment schema - supports development, staging, production, and test.
 */
export const NodeEnvSchema = z.enum(['development', 'staging', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema.
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT & SERVER
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** HTTP / WebSocket server port */
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),

  /** Server bind address */
  HOST: z.string().default('0.0.0.0'),

  /** Allowed origin for WebSocket clients */
  CORS_ORIGIN: z.string().default('*'),

  /** Socket.IO ping timeout (milliseconds) */
  WS_PING_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Minimum log level */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Console log format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  // ===================================================================
  // GAME CONFIGURATION
  // ===================================================================

  /** Consecutive non-capturing moves after which a match is drawn */
  DRAW_MOVE_LIMIT: z.coerce.number().int().positive().default(40),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        : [{ path: '', message: result.error.message }];

    return {
      success: false,
      errors,
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Load and validate environment variables, exiting on failure.
 *
 * This function should be called once at startup. If validation fails,
 * it prints the issues and exits the process.
 */
export function loadEnvOrExit(env: Record<string, string | undefined> = process.env): RawEnv {
  const result = parseEnv(env);

  if (!result.success || !result.data) {
    console.error('Invalid environment configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error.path || 'root'}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}

/**
 * Check if running in a production-like environment (production or staging).
 */
export function isProductionLike(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production' || nodeEnv === 'staging';
}
