/**
 * Grid Signal Scanner
 *
 * Entry point. Runs a single scan and exits, or keeps scanning every
 * SCAN_INTERVAL_MINUTES with graceful shutdown on process signals.
 */

import { App } from './app.js';
import { config } from './config.js';
import { logger } from './logger.js';
import { createShutdownHandler, createUncaughtExceptionHandler } from './shutdown.js';

// Create application instance
const app = new App();

const shutdown = createShutdownHandler(app);

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

async function main(): Promise<void> {
  logger.info('='.repeat(50));
  logger.info('Grid Signal Scanner');
  logger.info('='.repeat(50));

  if (config.scan.intervalMinutes <= 0) {
    try {
      const report = await app.runScan();
      logger.info('Single scan complete', {
        scanned: report.scanned,
        signals: report.signals.length,
        alerts: report.alerts.length,
      });
    } catch (error) {
      logger.error('Single scan failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exitCode = 1;
    }
    return;
  }

  // Register signal handlers
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Handle uncaught exceptions
  process.on('uncaughtException', createUncaughtExceptionHandler(shutdown));

  try {
    await app.start();
  } catch (error) {
    logger.error('Failed to start application', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

// Run
void main();
