#!/usr/bin/env node
/**
 * @file main.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { getEnv } from './config/env.js';
import { CONNECTION_TIMING } from './config/constants.js';
import { createLogger } from './infrastructure/logging/pino-logger.js';
import { createRelayServer } from './relay-server.js';
import { getRelayVersion } from './utils/version.js';

/**
 * Prints the startup banner to console.
 */
function printBanner(version: string): void {
  const dim = '\x1b[2m';
  const cyan = '\x1b[36m';
  const white = '\x1b[97m';
  const reset = '\x1b[0m';

  const banner = `
${cyan}   ┌─┐┌─┐┌┬┐┌─┐┌─┐┬ ┬┌─┐┬─┐┌─┐${reset}
${cyan}   │  │ │ ││├┤ └─┐├─┤├─┤├┬┘├┤ ${reset}
${cyan}   └─┘└─┘─┴┘└─┘└─┘┴ ┴┴ ┴┴└─└─┘${reset}

   ${white}Relay Server${reset}  ${dim}·  Collaborative editing sessions over WebSocket${reset}
   ${dim}v${version}${reset}
`;
  process.stdout.write(banner);
}

/**
 * Bootstraps and starts the relay server.
 */
async function bootstrap(): Promise<void> {
  const version = getRelayVersion();
  printBanner(version);

  // Load configuration
  const env = getEnv();

  // Create logger
  const logger = createLogger({
    name: 'codeshare-relay',
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  });

  logger.info(
    {
      version,
      nodeEnv: env.NODE_ENV,
      wsPath: env.WS_PATH,
      outboundQueueCapacity: env.OUTBOUND_QUEUE_CAPACITY,
      hubIdleTimeoutMs: env.HUB_IDLE_TIMEOUT_MS,
    },
    'Starting relay server'
  );

  const server = await createRelayServer({ env, logger, version });

  try {
    const address = await server.listen();
    logger.info(
      { address, wsPath: `${env.WS_PATH}/:sessionId` },
      'Relay server is running'
    );
  } catch (error) {
    logger.fatal({ error }, 'Failed to start server');
    process.exit(1);
  }

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutdown signal received');

    // Force exit after timeout
    const forceExitTimer = setTimeout(() => {
      logger.error('Shutdown timed out, forcing exit');
      process.exit(1);
    }, CONNECTION_TIMING.SHUTDOWN_TIMEOUT_MS);

    try {
      await server.close();
      clearTimeout(forceExitTimer);
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      clearTimeout(forceExitTimer);
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });

  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    process.exit(1);
  });
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to bootstrap:', error);
  process.exit(1);
});
