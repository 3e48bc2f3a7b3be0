/**
 * Logging service using Pino
 * Structured JSON logs in production, pretty-printed logs in development
 */

import pino from 'pino';

/**
 * Development transport configuration with pretty printing
 */
const developmentTransport = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'pid,hostname',
    messageFormat: '{levelLabel} - {msg}',
  },
};

/**
 * Production logger configuration (JSON format for log aggregation)
 */
const productionConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      hostname: bindings.hostname,
      node_version: process.version,
    }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    env: process.env.NODE_ENV,
  },
};

/**
 * Development logger configuration (human-readable format)
 */
const developmentConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'debug',
  transport: developmentTransport,
};

/**
 * Test and unset environments log plain JSON at the configured level
 */
const defaultConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
};

function selectConfig(env: string | undefined): pino.LoggerOptions {
  if (env === 'production') return productionConfig;
  if (env === 'development') return developmentConfig;
  return defaultConfig;
}

/**
 * Main logger instance
 */
export const logger = pino(selectConfig(process.env.NODE_ENV));

export type Logger = pino.Logger;

/**
 * Create a child logger with custom context
 * @param context - Arbitrary context object to attach to all logs
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Create a child logger bound to one analysis run
 */
export function createAnalysisLogger(analysisId: string): Logger {
  return logger.child({ analysisId, context: 'analysis' });
}

/**
 * Log system startup information
 */
export function logStartup(port: number | string) {
  logger.info(
    {
      port,
      nodeEnv: process.env.NODE_ENV,
      nodeVersion: process.version,
      logLevel: logger.level,
    },
    'Server starting'
  );
}

/**
 * Log system shutdown information
 */
export function logShutdown(signal: string) {
  logger.info({ signal }, 'Shutting down gracefully');
}
