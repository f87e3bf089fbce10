/**
 * HTTP server host: node:http in front of handleRequest, with graceful
 * shutdown that closes the listener and then the database.
 */

import { createServer, type Server } from 'node:http';
import { handleRequest } from './router.js';
import { toRequest, writeResponse } from './http.js';
import { jsonError } from './error-handler.js';
import type { Container } from './container.js';

export interface RunningServer {
  server: Server;
  port: number;
  stop(): Promise<void>;
}

export interface StartServerOptions {
  host?: string;
  port?: number;
}

export function startServer(container: Container, options: StartServerOptions = {}): Promise<RunningServer> {
  const { config, logger } = container;
  const host = options.host ?? config.host;
  const port = options.port ?? config.port;

  const server = createServer((req, res) => {
    toRequest(req)
      .then(request => handleRequest(request, container))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Failed to handle request');
        return jsonError(500, 'INTERNAL_ERROR', 'Internal server error');
      })
      .then(response => writeResponse(response, res))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Failed to write response');
        res.destroy();
      });
  });

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    stopping ??= new Promise<void>((resolve, reject) => {
      server.close((error) => {
        container.close();
        logger.info('Server stopped');
        if (error) reject(error);
        else resolve();
      });
      server.closeIdleConnections();
    });
    return stopping;
  };

  return new Promise((resolve, reject) => {
    server.once('error', (error) => {
      logger.error({ err: error }, 'Server error');
      reject(error);
    });

    server.listen(port, host, () => {
      const address = server.address();
      const boundPort = typeof address === 'object' && address !== null ? address.port : port;
      logger.info({ host, port: boundPort }, 'Server listening');
      resolve({ server, port: boundPort, stop });
    });
  });
}

/** Stop on SIGINT/SIGTERM */
export function installShutdownHandlers(running: RunningServer, container: Container): void {
  const shutdown = (signal: NodeJS.Signals): void => {
    container.logger.info({ signal }, 'Shutting down');
    running.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        container.logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
