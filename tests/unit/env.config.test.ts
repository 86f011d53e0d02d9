/**
 * Environment Configuration Tests
 *
 * Tests for the Zod-based environment variable validation system.
 * These tests verify that:
 * - Defaults are applied correctly
 * - Type coercion works as expected
 * - Invalid configurations fail with the offending path
 */

import {
  EnvSchema,
  parseEnv,
  getEffectiveNodeEnv,
  isProduction,
  isTest,
  isProductionLike,
  type RawEnv,
} from '../../src/server/config/env';
import { config } from '../../src/server/config';

describe('EnvSchema', () => {
  describe('defaults', () => {
    it('should apply defaults to an empty environment', () => {
      const result = parseEnv({});

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        NODE_ENV: 'development',
        PORT: 8000,
        HOST: '0.0.0.0',
        CORS_ORIGIN: '*',
        WS_PING_TIMEOUT_MS: 20000,
        LOG_LEVEL: 'info',
        LOG_FORMAT: 'pretty',
        DRAW_MOVE_LIMIT: 40,
      });
    });
  });

  describe('coercion', () => {
    it('should coerce numeric strings', () => {
      const result = parseEnv({ PORT: '3000', DRAW_MOVE_LIMIT: '80', WS_PING_TIMEOUT_MS: '5000' });

      expect(result.data?.PORT).toBe(3000);
      expect(result.data?.DRAW_MOVE_LIMIT).toBe(80);
      expect(result.data?.WS_PING_TIMEOUT_MS).toBe(5000);
    });
  });

  describe('validation', () => {
    it('should accept every NODE_ENV value', () => {
      for (const nodeEnv of ['development', 'staging', 'production', 'test']) {
        expect(parseEnv({ NODE_ENV: nodeEnv }).data?.NODE_ENV).toBe(nodeEnv);
      }
    });

    it('should reject an invalid NODE_ENV', () => {
      const result = parseEnv({ NODE_ENV: 'invalid' });

      expect(result.success).toBe(false);
      expect(result.errors?.some((e) => e.path === 'NODE_ENV')).toBe(true);
    });

    it('should reject an out-of-range PORT', () => {
      const result = parseEnv({ PORT: '70000' });

      expect(result.success).toBe(false);
      expect(result.errors?.map((e) => e.path)).toEqual(['PORT']);
    });

    it('should reject a non-positive DRAW_MOVE_LIMIT', () => {
      expect(parseEnv({ DRAW_MOVE_LIMIT: '0' }).success).toBe(false);
    });

    it('should reject an unknown LOG_LEVEL', () => {
      const result = parseEnv({ LOG_LEVEL: 'verbose' });

      expect(result.success).toBe(false);
      expect(result.errors?.[0].path).toBe('LOG_LEVEL');
    });
  });
});

describe('environment helpers', () => {
  const rawEnv: RawEnv = EnvSchema.parse({ NODE_ENV: 'production' });

  it('should treat Jest runs as test regardless of NODE_ENV', () => {
    expect(getEffectiveNodeEnv(rawEnv)).toBe('test');
  });

  it('should classify node environments', () => {
    expect(isProduction('production')).toBe(true);
    expect(isProduction('staging')).toBe(false);
    expect(isProductionLike('staging')).toBe(true);
    expect(isProductionLike('development')).toBe(false);
    expect(isTest('test')).toBe(true);
  });
});

describe('config', () => {
  it('should load the test configuration', () => {
    expect(config.isTest).toBe(true);
    expect(config.logging.level).toBe('error');
    expect(config.game.drawMoveLimit).toBeGreaterThan(0);
    expect(Object.isFrozen(config)).toBe(true);
  });
});
