/**
 * Server entry point
 */

import { loadConfig, createLogger } from '@taskdeck/core';
import { createContainer } from './container.js';
import { startServer, installShutdownHandlers } from './server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ name: 'taskdeck-server', level: config.logLevel, pretty: config.debug });

  logger.info({ name: config.appName, version: config.appVersion, debug: config.debug }, 'Starting');

  const container = createContainer(config, logger);
  const running = await startServer(container);
  installShutdownHandlers(running, container);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
