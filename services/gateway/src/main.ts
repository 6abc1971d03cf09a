/**
 * Switchboard Gateway
 * Main entry point
 */

import 'dotenv/config';
import type { FastifyInstance } from 'fastify';
import { createLogger } from '@switchboard/sdk';
import { loadConfig } from './config';
import { buildRuntime } from './registries';
import { startServer } from './server';

/**
 * Graceful shutdown handling
 */
function setupGracefulShutdown(app: FastifyInstance): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  for (const signal of signals) {
    process.once(signal, () => {
      app.log.info(`Received ${signal}, shutting down gracefully`);
      app.close().then(
        () => {
          app.log.info('Server closed successfully');
          process.exit(0);
        },
        (error: unknown) => {
          app.log.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      );
    });
  }
}

/**
 * Start the application
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ name: 'switchboard', level: config.logLevel });
  const runtime = await buildRuntime(config, logger);

  const app = await startServer({
    config,
    provider: runtime.provider,
    framework: runtime.framework
  });
  setupGracefulShutdown(app);
}

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:', reason);
  process.exit(1);
});

main().catch((error: unknown) => {
  console.error('Failed to start application:', error);
  process.exit(1);
});
