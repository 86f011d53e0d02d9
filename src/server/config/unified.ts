/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a frozen
 * config object that all server code should use.
 *
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { NodeEnvSchema, LogLevelSchema, LogFormatSchema, getEffectiveNodeEnv, loadEnvOrExit } from './env';

// Load .env into process.env before we read anything from it. Skipped under
// test so a developer's .env cannot leak into test runs.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const env = loadEnvOrExit(process.env);

const nodeEnv = getEffectiveNodeEnv(env);

/**
 * Application configuration schema.
 */
const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isDevelopment: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    version: z.string().min(1),
  }),
  server: z.object({
    port: z.number().int().positive(),
    host: z.string().min(1),
    corsOrigin: z.string().min(1),
    wsPingTimeoutMs: z.number().int().positive(),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
  }),
  game: z.object({
    drawMoveLimit: z.number().int().positive(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

const preliminaryConfig = {
  nodeEnv,
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',
  app: {
    version: env.npm_package_version?.trim() || '1.0.0',
  },
  server: {
    port: env.PORT,
    host: env.HOST,
    corsOrigin: env.CORS_ORIGIN,
    wsPingTimeoutMs: env.WS_PING_TIMEOUT_MS,
  },
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
  },
  game: {
    drawMoveLimit: env.DRAW_MOVE_LIMIT,
  },
};

export const config: Readonly<AppConfig> = Object.freeze(ConfigSchema.parse(preliminaryConfig));
