/**
 * Debate Sentiment Server
 * Main entry point for the Express application
 */

import { appConfig, validateAppConfig } from './config/app-config.js';
import { createApp } from './app.js';
import { createAnalysisPipeline } from './services/analysis/analysis-pipeline.js';
import { createTranscriptFetcher } from './services/source/transcript-fetcher.js';
import { logger, logStartup, logShutdown } from './services/logging/logger.js';

const app = createApp({
  pipeline: createAnalysisPipeline({ fetcher: createTranscriptFetcher(appConfig.fetch) }),
});

/**
 * Server lifecycle
 */

let server: ReturnType<typeof app.listen> | null = null;

function start() {
  try {
    validateAppConfig();
  } catch (error) {
    logger.error({ error }, 'Invalid configuration - server not started');
    process.exit(1);
  }

  logStartup(appConfig.port);

  server = app.listen(appConfig.port, () => {
    logger.info({ port: appConfig.port, env: process.env.NODE_ENV }, 'Server started');
  });

  server.on('error', (error: Error) => {
    logger.error({ error }, 'Server error');
    process.exit(1);
  });
}

/**
 * Graceful shutdown
 */
function shutdown(signal: string) {
  logShutdown(signal);

  if (!server) {
    process.exit(0);
  }

  server.close((error) => {
    if (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
    logger.info('HTTP server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

start();
