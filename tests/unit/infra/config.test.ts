/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { parseEnv, createConfig } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.PIPELINE_MANIFEST).toBe('pipelines.yaml');
    });

    it('accepts valid NODE_ENV values', () => {
      expect(parseEnv({ NODE_ENV: 'development' }).NODE_ENV).toBe('development');
      expect(parseEnv({ NODE_ENV: 'production' }).NODE_ENV).toBe('production');
      expect(parseEnv({ NODE_ENV: 'test' }).NODE_ENV).toBe('test');
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        const env = parseEnv({ LOG_LEVEL: level });
        expect(env.LOG_LEVEL).toBe(level);
      }
    });

    it('reads the manifest path', () => {
      expect(parseEnv({ PIPELINE_MANIFEST: 'config/runs.yaml' }).PIPELINE_MANIFEST).toBe(
        'config/runs.yaml'
      );
    });

    it('throws on invalid NODE_ENV', () => {
      expect(() => parseEnv({ NODE_ENV: 'staging' })).toThrow('Invalid environment configuration');
    });

    it('throws on invalid LOG_LEVEL', () => {
      expect(() => parseEnv({ LOG_LEVEL: 'verbose' })).toThrow('Invalid environment configuration');
    });

    it('throws on an empty manifest path', () => {
      expect(() => parseEnv({ PIPELINE_MANIFEST: '' })).toThrow(
        'Invalid environment configuration: /PIPELINE_MANIFEST'
      );
    });
  });

  describe('createConfig', () => {
    it('enables pretty logs outside production', () => {
      expect(createConfig(parseEnv({ NODE_ENV: 'development' })).logger.pretty).toBe(true);
      expect(createConfig(parseEnv({ NODE_ENV: 'production' })).logger.pretty).toBe(false);
    });

    it('passes the log level and manifest path through', () => {
      const config = createConfig(parseEnv({ LOG_LEVEL: 'debug', PIPELINE_MANIFEST: 'runs.yaml' }));

      expect(config.logger.level).toBe('debug');
      expect(config.pipelines.manifestPath).toBe('runs.yaml');
    });

    it('holds only the settings the pipeline runner reads', () => {
      expect(Object.keys(createConfig(parseEnv({})))).toEqual(['logger', 'pipelines']);
    });
  });
});
