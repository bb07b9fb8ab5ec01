/**
 * HTTP server entrypoint for the plan store service.
 *
 * This file:
 * - Builds runtime dependencies (schema, Redis) in the composition root
 * - Creates the Express app
 * - Starts listening on the configured port
 * - Closes the server and the Redis connection on SIGTERM / SIGINT
 */
import { createServer } from 'http';
import { createApp } from './app';
import { buildRuntimeDeps, type RuntimeDeps } from './bootstrap/buildDeps';
import { config } from './shared/config/Config';
import { logger } from './shared/logging/Logger';

let deps: RuntimeDeps;
try {
  deps = buildRuntimeDeps();
} catch (err) {
  logger.fatal({ err }, 'Failed to initialise plan store service');
  process.exit(1);
}

const server = createServer(createApp(deps));

server.listen(config.port, () => {
  logger.info(
    {
      port: config.port,
      env: config.env,
    },
    'Plan store service started',
  );
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, 'Shutting down gracefully...');
  server.close(() => {
    logger.info('HTTP server closed');
    deps
      .shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Failed to release resources on shutdown');
        process.exit(1);
      });
  });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
