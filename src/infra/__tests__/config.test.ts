/**
 * Configuration Unit Tests
 *
 * Tests EnvConfig, ConfigStub and typed settings parsing
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EnvConfig, ConfigStub, readSettings } from '../config.js';

describe('Configuration', () => {
  describe('EnvConfig', () => {
    let config: EnvConfig;
    const originalEnv = process.env;

    beforeEach(() => {
      process.env = { ...originalEnv };
      config = new EnvConfig();
    });

    afterEach(() => {
      process.env = originalEnv;
    });

    it('should get existing environment variable', () => {
      process.env.TEST_KEY = 'test-value';
      expect(config.get('TEST_KEY')).toBe('test-value');
    });

    it('should return undefined for non-existent key', () => {
      expect(config.get('NON_EXISTENT_KEY')).toBeUndefined();
    });

    it('should handle numeric values as strings', () => {
      process.env.PORT = '3000';
      expect(config.get('PORT')).toBe('3000');
    });
  });

  describe('ConfigStub', () => {
    it('should return the fixed values it was given', () => {
      const config = new ConfigStub({ STORAGE_TYPE: 'redis' });
      expect(config.get('STORAGE_TYPE')).toBe('redis');
      expect(config.get('REDIS_URL')).toBeUndefined();
    });
  });

  describe('readSettings', () => {
    it('should apply defaults for an empty source', () => {
      expect(readSettings(new ConfigStub())).toEqual({
        storageType: 'memory',
        redisUrl: undefined,
        generator: 'rule-based',
        llmProvider: 'openai',
        headless: true,
        appBaseUrl: undefined,
        apiBaseUrl: undefined,
        apiHealthPath: undefined,
        maxConcurrency: 3,
        healthCheckConcurrency: 4,
        retryBackoff: 'none',
        retryInitialDelayMs: 0,
        port: 3001,
        logLevel: 'info',
        logDir: undefined,
      });
    });

    it('should parse and normalise provided values', () => {
      const settings = readSettings(
        new ConfigStub({
          STORAGE_TYPE: 'Redis',
          REDIS_URL: ' redis://localhost:6379 ',
          GENERATOR: 'LLM',
          LLM_PROVIDER: 'anthropic',
          HEADLESS: 'false',
          APP_BASE_URL: 'https://app.example.com',
          MAX_CONCURRENCY: '8',
          RETRY_BACKOFF: 'linear',
          RETRY_INITIAL_DELAY_MS: '250',
          PORT: '8080',
          LOG_LEVEL: 'debug',
          LOG_DIR: '/var/log/storyflow',
        })
      );

      expect(settings.storageType).toBe('redis');
      expect(settings.redisUrl).toBe('redis://localhost:6379');
      expect(settings.generator).toBe('llm');
      expect(settings.llmProvider).toBe('anthropic');
      expect(settings.headless).toBe(false);
      expect(settings.appBaseUrl).toBe('https://app.example.com');
      expect(settings.maxConcurrency).toBe(8);
      expect(settings.retryBackoff).toBe('linear');
      expect(settings.retryInitialDelayMs).toBe(250);
      expect(settings.port).toBe(8080);
      expect(settings.logLevel).toBe('debug');
      expect(settings.logDir).toBe('/var/log/storyflow');
    });

    it('should treat empty strings as unset', () => {
      const settings = readSettings(new ConfigStub({ MAX_CONCURRENCY: '', STORAGE_TYPE: '' }));
      expect(settings.maxConcurrency).toBe(3);
      expect(settings.storageType).toBe('memory');
    });

    it('should reject an unknown storage type', () => {
      expect(() => readSettings(new ConfigStub({ STORAGE_TYPE: 'postgres' }))).toThrow();
    });

    it('should reject an unknown log level', () => {
      expect(() => readSettings(new ConfigStub({ LOG_LEVEL: 'verbose' }))).toThrow();
    });

    it('should reject a non-positive concurrency', () => {
      expect(() => readSettings(new ConfigStub({ MAX_CONCURRENCY: '0' }))).toThrow();
    });
  });
});
