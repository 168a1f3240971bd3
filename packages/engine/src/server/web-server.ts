import type { ServerConfig } from "../config/server-config.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { IHostIdentity } from "../interfaces/host-identity.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { RequestHandler } from "./request-handler.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  identity: IHostIdentity;
  config: ServerConfig;
  logger?: Logger;
  clock?: () => Date;
}

export type WebServerEvents = {
  listening: [port: number];
  close: [];
  error: [err: Error];
};

/**
 * Accept loop: every connection gets its own independent RequestHandler
 * run. Nothing is shared between runs except the filesystem.
 */
export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private handler: RequestHandler;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();

    this.handler = new RequestHandler({
      fileSystem: options.fileSystem,
      identity: options.identity,
      config: this.config,
      logger: this.logger,
      clock: options.clock,
    });
  }

  get connectionCount(): number {
    return this.activeConnections.size;
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.logger.error("Rejected connection:", err);
          return;
        }
        this.handleConnection(socket).catch((err) => {
          this.logger.error("Connection handler failed:", err);
        });
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      // Close all active connections
      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  private async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError(() => {
      this.activeConnections.delete(socket);
    });

    try {
      await this.handler.handle(socket);
    } finally {
      this.activeConnections.delete(socket);
    }
  }
}
