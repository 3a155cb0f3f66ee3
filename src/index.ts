/**
 * NewsPulse — Server Entry Point
 *
 * Loads config, starts the refresh scheduler and the HTTP API.
 *
 * Run with: npm start
 */

import 'dotenv/config';
import { loadConfig } from './config';
import { createNewsPulse } from './app';
import { startServer } from './server/api';
import { errorMessage, logger, setLogLevel } from './lib/logger';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  logger.info('Starting NewsPulse', {
    port: config.port,
    refreshIntervalMs: config.refreshIntervalMs,
    maxItems: config.maxItems,
    defaultQueryLimit: config.defaultQueryLimit,
  });

  const pulse = await createNewsPulse(config);
  const server = await startServer(pulse.api, config.port);

  pulse.scheduler.start();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('Shutting down', { signal });
    pulse.scheduler.stop();
    server.close(error => {
      if (error) {
        logger.error('Error closing server', { error: error.message });
        process.exitCode = 1;
      }
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  logger.error('Startup failed', { error: errorMessage(error) });
  process.exit(1);
});
