import { Command } from 'commander';
import { createContainer, startServer, installShutdownHandlers } from '@taskdeck/server';
import { createLogger } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseCount } from '../helpers.js';

export function createServeCommand(ctx: CliContext): Command {
  return new Command('serve')
    .description('Run the HTTP API')
    .option('--host <host>', 'Interface to bind')
    .option('--port <port>', 'Port to listen on')
    .action(async (opts: { host?: string; port?: string }) => {
      try {
        const { config } = ctx;
        const logger = createLogger({ name: 'taskdeck-server', level: config.logLevel, pretty: config.debug });
        logger.info({ name: config.appName, version: config.appVersion, debug: config.debug }, 'Starting');

        const container = createContainer(config, logger, ctx.db());
        const running = await startServer(container, {
          host: opts.host,
          port: opts.port === undefined ? undefined : parseCount(opts.port),
        });
        installShutdownHandlers(running, container);
      } catch (err: unknown) {
        out.fail(err instanceof Error ? err.message : String(err));
      }
    });
}
