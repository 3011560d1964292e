#!/usr/bin/env node
import { binary, run } from 'cmd-ts';
import { cli } from './app.js';
import { errorMessage } from './errors/custom-errors.js';
import { logger } from './utils/logger.js';

/**
 * ytimport - fetch audio with yt-dlp, split it by chapters and import it into beets
 */

// Set up global error handlers
process.on('uncaughtException', (error) => {
  logger.error(`Uncaught exception: ${error.message}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
  process.exit(1);
});

run(binary(cli), process.argv).catch((error: unknown) => {
  logger.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
