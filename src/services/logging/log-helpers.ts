/**
 * Structured logging helpers for common event types
 * Provides consistent logging patterns across the application
 */

import { logger } from './logger.js';

export type PipelineStage = 'attribute' | 'score' | 'summarize';

/**
 * Category-based logging helpers
 * Each helper logs a specific type of event with consistent structure
 */
export const loggers = {
  /**
   * Log completion of one pipeline stage
   */
  pipelineStage(
    analysisId: string,
    stage: PipelineStage,
    details: { durationMs: number; inputCount?: number; outputCount?: number }
  ) {
    logger.info({
      category: 'pipeline',
      event: 'stage_completed',
      analysisId,
      stage,
      duration_ms: details.durationMs,
      input_count: details.inputCount,
      output_count: details.outputCount,
    }, `Stage ${stage} completed in ${details.durationMs}ms`);
  },

  /**
   * Log speaker profile validation results
   * @param profileName - Name of the profile being compiled
   * @param valid - Whether validation passed
   * @param issues - Validation issues if it failed
   */
  profileValidation(profileName: string, valid: boolean, issues?: string[]) {
    if (valid) {
      logger.debug({
        category: 'validation',
        event: 'profile_valid',
        profileName,
      }, `Speaker profile valid: ${profileName}`);
    } else {
      logger.error({
        category: 'validation',
        event: 'profile_invalid',
        profileName,
        issues,
        issue_count: issues?.length || 0,
      }, `Speaker profile invalid: ${profileName}`);
    }
  },

  /**
   * Log an outbound document fetch
   */
  fetch(params: {
    url: string;
    status?: number;
    latency_ms: number;
    bytes?: number;
    success: boolean;
    error?: string;
  }) {
    const level = params.success ? 'info' : 'warn';
    logger[level]({
      category: 'fetch',
      event: 'document_fetch',
      ...params,
    }, `Fetch ${params.url} ${params.success ? 'succeeded' : 'failed'} in ${params.latency_ms}ms`);
  },

  /**
   * Log errors with full context and stack traces
   * @param message - Human-readable error message
   * @param error - Error object
   * @param context - Additional context (analysisId, stage, etc.)
   */
  error(message: string, error: Error, context?: Record<string, unknown>) {
    logger.error({
      category: 'error',
      event: 'error_occurred',
      error: {
        message: error.message,
        stack: error.stack,
        name: error.name,
      },
      ...context,
    }, message);
  },
};

/**
 * Performance timing helper
 * Returns a function that logs the duration when called
 *
 * @example
 * const endTimer = startTimer();
 * const utterances = attributeTranscript(lines, profile);
 * endTimer('attribute', { analysisId });
 */
export function startTimer() {
  const start = Date.now();
  return (operation: string, context?: Record<string, unknown>) => {
    const duration = Date.now() - start;
    logger.debug({
      category: 'performance',
      event: 'operation_timed',
      operation,
      duration_ms: duration,
      ...context,
    }, `${operation} completed in ${duration}ms`);
    return duration;
  };
}

/**
 * Async operation wrapper with automatic timing and error logging
 */
export async function loggedOperation<T>(
  operation: string,
  fn: () => Promise<T>,
  context?: Record<string, unknown>
): Promise<T> {
  const timer = startTimer();
  try {
    const result = await fn();
    timer(operation, { ...context, success: true });
    return result;
  } catch (error) {
    timer(operation, { ...context, success: false });
    const err = error instanceof Error ? error : new Error(String(error));
    loggers.error(`Operation failed: ${operation}`, err, context);
    throw error;
  }
}
