import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  getEnvInt,
  getEnvVar,
  validateAppConfig,
  type AppConfig,
} from '../src/config/app-config.js';

const validConfig: AppConfig = {
  port: 3000,
  fetch: { timeoutMs: 15000, userAgent: 'test-agent' },
  speakerProfilePath: './profiles/leaders-debate.json',
  rollingWindow: 5,
};

describe('App Config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('getEnvInt', () => {
    it('should parse integer values', () => {
      vi.stubEnv('TEST_WINDOW', '7');
      expect(getEnvInt('TEST_WINDOW', 5)).toBe(7);
    });

    it('should fall back to the default for missing or invalid values', () => {
      expect(getEnvInt('TEST_MISSING_INT', 5)).toBe(5);
      vi.stubEnv('TEST_WINDOW', 'wide');
      expect(getEnvInt('TEST_WINDOW', 5)).toBe(5);
    });
  });

  describe('getEnvVar', () => {
    it('should use the default when unset', () => {
      expect(getEnvVar('TEST_MISSING_VAR', false, 'fallback')).toBe('fallback');
    });

    it('should throw for missing required variables', () => {
      expect(() => getEnvVar('TEST_MISSING_VAR', true)).toThrow(
        'Missing required environment variable: TEST_MISSING_VAR'
      );
    });
  });

  describe('validateAppConfig', () => {
    it('should accept a valid configuration', () => {
      expect(() => validateAppConfig(validConfig)).not.toThrow();
    });

    it('should list every problem', () => {
      expect(() =>
        validateAppConfig({
          ...validConfig,
          port: 0,
          fetch: { ...validConfig.fetch, timeoutMs: 10 },
          rollingWindow: 0,
        })
      ).toThrow(
        'Configuration validation failed:\n' +
          'PORT must be between 1 and 65535\n' +
          'FETCH_TIMEOUT_MS must be >= 1000 (1 second)\n' +
          'ROLLING_WINDOW must be >= 1'
      );
    });
  });
});
