import express from 'express';
import type { Server } from 'http';
import { log, type Logger } from '@opgraph/core';
import { loadManagerConfig } from './config.js';
import { createNetworkManagerRouter } from './router.js';
import type { NetworkManager } from './manager.js';

export interface ServerOptions {
  /** Defaults to OPGRAPH_MANAGER_PORT */
  port?: number;
  /** Defaults to OPGRAPH_MANAGER_API_PATH */
  apiPath?: string;
  logger?: Logger;
}

/**
 * Express app exposing the network manager API
 */
export function createNetworkManagerApp(
  manager: NetworkManager,
  options: Pick<ServerOptions, 'apiPath' | 'logger'> = {}
): express.Express {
  const app = express();
  app.use(express.json());
  app.use(options.apiPath ?? '/api', createNetworkManagerRouter(manager, options.logger));
  return app;
}

/**
 * Start an Express server that exposes the network manager API
 */
export function startNetworkManagerServer(manager: NetworkManager, options: ServerOptions = {}): Server {
  const config = loadManagerConfig();
  const logger = (options.logger ?? log).child({ component: 'network-manager-server' });
  const apiPath = options.apiPath ?? config.apiPath;
  const app = createNetworkManagerApp(manager, { apiPath, logger: options.logger });

  const port = options.port ?? config.port;
  const server = app.listen(port, () => {
    logger.info({ port, apiPath }, `network manager listening on http://localhost:${port}${apiPath}`);
  });

  return server;
}
