/**
 * Process-level shutdown handlers
 */

import type { App } from './app.js';
import { logger } from './logger.js';

export type ExitFn = (code: number) => void;

/**
 * Graceful shutdown handler: stop the app, then exit
 */
export function createShutdownHandler(
  app: Pick<App, 'stop'>,
  exit: ExitFn = (code) => process.exit(code)
): (signal: string) => Promise<void> {
  return async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, initiating graceful shutdown...`);

    try {
      await app.stop(`Received ${signal}`);
      logger.info('Graceful shutdown complete');
      exit(0);
    } catch (error) {
      logger.error('Error during shutdown', {
        error: error instanceof Error ? error.message : String(error),
      });
      exit(1);
    }
  };
}

/**
 * Log an uncaught exception and shut down
 */
export function createUncaughtExceptionHandler(
  shutdown: (signal: string) => Promise<void>,
  exit: ExitFn = (code) => process.exit(code)
): (error: Error) => void {
  return (error: Error): void => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    shutdown('uncaughtException').catch(() => exit(1));
  };
}
