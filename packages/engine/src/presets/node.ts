import { NodeSocketFactory } from "../adapters/node/node-socket.js";
import type { ServerConfig } from "../config/server-config.js";
import type { Logger } from "../logging/logger.js";
import type { RequestHandler } from "../server/connection-handler.js";
import { WebServer } from "../server/web-server.js";
import type { ShutdownSignal } from "../shutdown/shutdown-signal.js";

export interface NodeServerOptions {
  config: ServerConfig;
  logger?: Logger;
  handler?: RequestHandler;
  shutdown?: ShutdownSignal;
}

export function createNodeServer(options: NodeServerOptions): WebServer {
  return new WebServer({
    socketFactory: new NodeSocketFactory(),
    config: options.config,
    logger: options.logger,
    handler: options.handler,
    shutdown: options.shutdown,
  });
}
