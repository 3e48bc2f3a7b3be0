/**
 * Logging Service Tests
 * Tests for logger, log helpers and performance timing
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  logger,
  createLogger,
  createAnalysisLogger,
  loggers,
  startTimer,
  loggedOperation,
} from '../src/services/logging/index.js';

function spyOnLogger() {
  return {
    info: vi.spyOn(logger, 'info'),
    error: vi.spyOn(logger, 'error'),
    debug: vi.spyOn(logger, 'debug'),
    warn: vi.spyOn(logger, 'warn'),
  };
}

describe('Logger', () => {
  describe('Core Logger', () => {
    it('should create logger instance', () => {
      expect(logger).toBeDefined();
      expect(typeof logger.info).toBe('function');
      expect(typeof logger.error).toBe('function');
      expect(typeof logger.warn).toBe('function');
      expect(typeof logger.debug).toBe('function');
    });

    it('should respect log level from environment', () => {
      expect(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).toContain(logger.level);
    });
  });

  describe('Child Loggers', () => {
    it('should create analysis logger with context', () => {
      const analysisLogger = createAnalysisLogger('analysis-123');
      expect(analysisLogger.bindings()).toEqual({ analysisId: 'analysis-123', context: 'analysis' });
    });

    it('should create custom logger with context', () => {
      const customLogger = createLogger({ module: 'test-module' });
      expect(customLogger.bindings()).toEqual({ module: 'test-module' });
    });
  });
});

describe('Structured Logging Helpers', () => {
  let spies: ReturnType<typeof spyOnLogger>;

  beforeEach(() => {
    spies = spyOnLogger();
  });

  afterEach(() => {
    Object.values(spies).forEach((spy) => spy.mockRestore());
  });

  describe('pipelineStage', () => {
    it('should log stage completion with counts', () => {
      loggers.pipelineStage('analysis-123', 'attribute', {
        durationMs: 12,
        inputCount: 40,
        outputCount: 6,
      });

      expect(spies.info).toHaveBeenCalledWith(
        {
          category: 'pipeline',
          event: 'stage_completed',
          analysisId: 'analysis-123',
          stage: 'attribute',
          duration_ms: 12,
          input_count: 40,
          output_count: 6,
        },
        'Stage attribute completed in 12ms'
      );
    });
  });

  describe('profileValidation', () => {
    it('should log successful validation', () => {
      loggers.profileValidation('leaders-debate', true);

      expect(spies.debug).toHaveBeenCalledWith(
        expect.objectContaining({
          category: 'validation',
          event: 'profile_valid',
          profileName: 'leaders-debate',
        }),
        'Speaker profile valid: leaders-debate'
      );
    });

    it('should log failed validation with issues', () => {
      loggers.profileValidation('broken', false, ['speakers: Required', 'name: Expected string']);

      expect(spies.error).toHaveBeenCalledWith(
        expect.objectContaining({
          category: 'validation',
          event: 'profile_invalid',
          profileName: 'broken',
          issues: ['speakers: Required', 'name: Expected string'],
          issue_count: 2,
        }),
        'Speaker profile invalid: broken'
      );
    });
  });

  describe('fetch', () => {
    it('should log successful fetches at info', () => {
      loggers.fetch({ url: 'https://example.com', status: 200, latency_ms: 80, bytes: 512, success: true });

      expect(spies.info).toHaveBeenCalledWith(
        expect.objectContaining({
          category: 'fetch',
          event: 'document_fetch',
          url: 'https://example.com',
          status: 200,
          bytes: 512,
        }),
        'Fetch https://example.com succeeded in 80ms'
      );
    });

    it('should log failed fetches at warn', () => {
      loggers.fetch({ url: 'https://example.com', latency_ms: 30, success: false, error: 'timeout' });

      expect(spies.warn).toHaveBeenCalledWith(
        expect.objectContaining({ success: false, error: 'timeout' }),
        'Fetch https://example.com failed in 30ms'
      );
    });
  });

  describe('error', () => {
    it('should log errors with context', () => {
      const testError = new Error('Test error');
      loggers.error('Operation failed', testError, { analysisId: 'analysis-123' });

      expect(spies.error).toHaveBeenCalledWith(
        expect.objectContaining({
          category: 'error',
          event: 'error_occurred',
          error: expect.objectContaining({
            message: 'Test error',
            name: 'Error',
          }),
          analysisId: 'analysis-123',
        }),
        'Operation failed'
      );
    });
  });
});

describe('Performance Timing', () => {
  let spies: ReturnType<typeof spyOnLogger>;

  beforeEach(() => {
    spies = spyOnLogger();
  });

  afterEach(() => {
    Object.values(spies).forEach((spy) => spy.mockRestore());
  });

  describe('startTimer', () => {
    it('should measure and log operation duration', async () => {
      const endTimer = startTimer();

      await new Promise((resolve) => setTimeout(resolve, 10));

      const duration = endTimer('test_operation', { analysisId: 'analysis-123' });

      expect(duration).toBeGreaterThanOrEqual(5);
      expect(spies.debug).toHaveBeenCalledWith(
        expect.objectContaining({
          category: 'performance',
          event: 'operation_timed',
          operation: 'test_operation',
          duration_ms: duration,
          analysisId: 'analysis-123',
        }),
        `test_operation completed in ${duration}ms`
      );
    });
  });

  describe('loggedOperation', () => {
    it('should wrap successful async operations', async () => {
      const result = await loggedOperation('load_profile', async () => ({ name: 'test' }), {
        analysisId: 'analysis-123',
      });

      expect(result).toEqual({ name: 'test' });
      expect(spies.debug).toHaveBeenCalledWith(
        expect.objectContaining({
          category: 'performance',
          operation: 'load_profile',
          success: true,
        }),
        expect.any(String)
      );
    });

    it('should log and rethrow failures', async () => {
      await expect(
        loggedOperation('load_profile', async () => {
          throw new Error('Profile missing');
        })
      ).rejects.toThrow('Profile missing');

      expect(spies.debug).toHaveBeenCalledWith(
        expect.objectContaining({ operation: 'load_profile', success: false }),
        expect.any(String)
      );
      expect(spies.error).toHaveBeenCalledWith(
        expect.objectContaining({
          category: 'error',
          error: expect.objectContaining({ message: 'Profile missing' }),
        }),
        'Operation failed: load_profile'
      );
    });
  });
});
