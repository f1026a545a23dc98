/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { createConfig, parseEnv } from '@/infra/config/env.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env).toEqual({
        NODE_ENV: 'development',
        LOG_LEVEL: 'info',
        PARAMS_FILE: './params.json',
      });
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        expect(parseEnv({ LOG_LEVEL: level }).LOG_LEVEL).toBe(level);
      }
    });

    it('reads PARAMS_FILE', () => {
      expect(parseEnv({ PARAMS_FILE: '/etc/runs/params.json' }).PARAMS_FILE).toBe(
        '/etc/runs/params.json'
      );
    });

    it('throws on an unknown LOG_LEVEL', () => {
      expect(() => parseEnv({ LOG_LEVEL: 'verbose' })).toThrow(
        /^Invalid environment configuration: \/LOG_LEVEL/
      );
    });

    it('throws on an empty PARAMS_FILE', () => {
      expect(() => parseEnv({ PARAMS_FILE: '' })).toThrow(/Invalid environment configuration/);
    });
  });

  describe('createConfig', () => {
    it('pretty-prints logs outside production', () => {
      expect(createConfig(parseEnv({ NODE_ENV: 'development' })).logger.pretty).toBe(true);
      expect(createConfig(parseEnv({ NODE_ENV: 'production' })).logger.pretty).toBe(false);
    });

    it('carries the params file into the run section', () => {
      const config = createConfig(parseEnv({ PARAMS_FILE: 'runs/june.json', LOG_LEVEL: 'debug' }));

      expect(config).toEqual({
        logger: { level: 'debug', pretty: true },
        run: { paramsFile: 'runs/june.json' },
      });
    });
  });
});
