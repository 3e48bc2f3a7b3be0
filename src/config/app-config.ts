/**
 * Application Configuration
 *
 * Runtime settings loaded from environment variables.
 */

import { config } from 'dotenv';
import { logger } from '../services/logging/logger.js';

// Load environment variables
config();

export interface AppConfig {
  /** HTTP port for the analysis API */
  port: number;
  /** Transcript download settings */
  fetch: {
    timeoutMs: number;
    userAgent: string;
  };
  /** Speaker profile used when a request or CLI run supplies none */
  speakerProfilePath: string;
  /** Window for the per-speaker rolling sentiment mean */
  rollingWindow: number;
}

/**
 * Get environment variable or throw error if required and missing
 */
export function getEnvVar(key: string, required: boolean = false, defaultValue?: string): string {
  const value = process.env[key] || defaultValue;

  if (required && !value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }

  return value || '';
}

/**
 * Parse integer from environment variable
 */
export function getEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    logger.warn({ key, value, defaultValue }, `Invalid integer value for ${key}, using default`);
    return defaultValue;
  }

  return parsed;
}

/**
 * Configuration loaded from environment variables
 *
 * Environment variables:
 * - PORT: HTTP port (default: 3000)
 * - FETCH_TIMEOUT_MS: Download timeout in milliseconds (default: 15000)
 * - FETCH_USER_AGENT: User agent sent with downloads (default: 'debate-sentiment/0.1')
 * - SPEAKER_PROFILE_PATH: Default speaker profile JSON (default: './profiles/leaders-debate.json')
 * - ROLLING_WINDOW: Rolling mean window in utterances (default: 5)
 */
export const appConfig: AppConfig = {
  port: getEnvInt('PORT', 3000),
  fetch: {
    timeoutMs: getEnvInt('FETCH_TIMEOUT_MS', 15000),
    userAgent: getEnvVar('FETCH_USER_AGENT', false, 'debate-sentiment/0.1'),
  },
  speakerProfilePath: getEnvVar('SPEAKER_PROFILE_PATH', false, './profiles/leaders-debate.json'),
  rollingWindow: getEnvInt('ROLLING_WINDOW', 5),
};

/**
 * Validate configuration at startup
 */
export function validateAppConfig(cfg: AppConfig = appConfig): void {
  const errors: string[] = [];

  if (cfg.port < 1 || cfg.port > 65535) {
    errors.push('PORT must be between 1 and 65535');
  }

  if (cfg.fetch.timeoutMs < 1000) {
    errors.push('FETCH_TIMEOUT_MS must be >= 1000 (1 second)');
  }

  if (cfg.rollingWindow < 1) {
    errors.push('ROLLING_WINDOW must be >= 1');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
}
