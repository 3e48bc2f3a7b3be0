/**
 * Logging service exports
 */

export {
  logger,
  createLogger,
  createAnalysisLogger,
  logStartup,
  logShutdown,
  type Logger,
} from './logger.js';

export {
  loggers,
  startTimer,
  loggedOperation,
  type PipelineStage,
} from './log-helpers.js';
