import {
  NodeFileSystem,
  NodeHostIdentity,
  NodeSocketFactory,
} from "../adapters/node/index.js";
import type { ServerConfig } from "../config/server-config.js";
import type { Logger } from "../logging/logger.js";
import { WebServer } from "../server/web-server.js";

export interface NodeServerOptions {
  config: ServerConfig;
  logger?: Logger;
}

export function createNodeServer(options: NodeServerOptions): WebServer {
  return new WebServer({
    socketFactory: new NodeSocketFactory(),
    fileSystem: new NodeFileSystem(),
    identity: new NodeHostIdentity(),
    config: options.config,
    logger: options.logger,
  });
}
