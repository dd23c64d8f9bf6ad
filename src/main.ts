#!/usr/bin/env node

/**
 * Gateway process entry point.
 *
 * Loads config/runtime.yaml (or GATEWAY_CONFIG), starts the gateway and
 * stops it cleanly on SIGINT / SIGTERM.
 */

import { createGateway } from './gateway.js';
import { loadConfig } from './config/loader.js';
import { createLogger } from './utils/logger-helpers.js';
import { GatewayError } from './api/errors.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logging.level);
  const gateway = createGateway(config, { logger });

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) {
      logger.warn({ signal }, 'Forced exit');
      process.exit(1);
    }
    stopping = true;
    logger.info({ signal }, 'Shutdown requested');
    gateway
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    const address = await gateway.start();
    logger.info({ host: address.address, port: address.port }, 'Gateway ready');
  } catch (error) {
    logger.fatal({ err: error }, 'Gateway failed to start');
    await gateway.stop();
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  const message = error instanceof GatewayError ? `${error.code}: ${error.message}` : String(error);
  console.error(`Fatal: ${message}`);
  process.exit(1);
});
