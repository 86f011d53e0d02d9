/**
 * Configuration Module - Canonical Entry Point
 *
 * All server code should import configuration from here:
 *
 *   import { config } from './config';
 */

export { config } from './unified';
export type { AppConfig } from './unified';

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  parseEnv,
  loadEnvOrExit,
  getEffectiveNodeEnv,
  isProduction,
  isTest,
  isProductionLike,
} from './env';

export type { RawEnv, EnvValidationResult, NodeEnv, LogLevel, LogFormat } from './env';
