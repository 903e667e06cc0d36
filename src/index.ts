#!/usr/bin/env node

/**
 * Work Gateway - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { ConfigError } from './core/errors.js';
import { GatewayServer } from './presentation/GatewayServer.js';
import { createLogger } from './utils/logger.js';

async function main() {
  const logger = createLogger('Main');
  let gateway: GatewayServer | null = null;

  try {
    const config = getConfig();
    printConfigInfo(config, createLogger('Config'));

    gateway = new GatewayServer(config);
    await gateway.start();

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info(`Received ${signal}, shutting down gracefully...`);
      try {
        await gateway?.shutdown();
        process.exit(0);
      } catch (error) {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
      logger.error('Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled Rejection:', reason);
      void shutdown('UNHANDLED_REJECTION');
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Configuration Validation Failed!');
      error.issues.forEach((issue) => logger.error(`  • ${issue}`));
      logger.error('Check your .env file and CLI arguments');
    } else {
      logger.error('Fatal error in main():', error);
    }

    if (gateway) {
      await gateway.shutdown().catch((shutdownError: unknown) => logger.error('Cleanup failed:', shutdownError));
    }
    process.exit(1);
  }
}

// Start the server
void main();
