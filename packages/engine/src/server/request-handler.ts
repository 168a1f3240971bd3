import type { ServerConfig } from "../config/server-config.js";
import { RequestReader, RequestReadError } from "../http/request-reader.js";
import { writeResponseHeader } from "../http/response-writer.js";
import { statusFor, type ResolvedResource } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { IHostIdentity } from "../interfaces/host-identity.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { ResourceResolver } from "./resource-resolver.js";
import { ResponseBodyWriter } from "./response-body-writer.js";

export interface RequestHandlerOptions {
  fileSystem: IFileSystem;
  identity: IHostIdentity;
  config: ServerConfig;
  logger?: Logger;
  /** Source of the current time for headers and the landing page. */
  clock?: () => Date;
}

/**
 * Handles exactly one request on one connection: read the request line,
 * resolve it, write header then body, close. Stateless between calls.
 */
export class RequestHandler {
  private config: ServerConfig;
  private logger: Logger;
  private clock: () => Date;
  private resolver: ResourceResolver;
  private bodyWriter: ResponseBodyWriter;

  constructor(options: RequestHandlerOptions) {
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();
    this.clock = options.clock ?? (() => new Date());

    this.resolver = new ResourceResolver({
      root: this.config.root,
      fs: options.fileSystem,
      templateFile: this.config.templateFile,
      logger: this.logger,
    });

    this.bodyWriter = new ResponseBodyWriter({
      fs: options.fileSystem,
      identity: options.identity,
      notFoundPath: this.resolver.pathFor(this.config.notFoundFile),
      materializedPath:
        this.config.materializedFile === null
          ? null
          : this.resolver.pathFor(this.config.materializedFile),
      clock: this.clock,
      logger: this.logger,
    });
  }

  /** Never rejects; the socket is always closed on return. */
  async handle(socket: ITcpSocket): Promise<void> {
    const addr = socket.remoteAddress ?? "?";
    this.logger.debug(`Handling connection from ${addr}`);

    try {
      const requestLine = await this.readRequestLine(socket);
      const resource = await this.resolveSafely(requestLine);
      const status = statusFor(resource);

      if (!this.config.quiet) {
        this.logger.info(
          `${requestLine ?? "(no request)"} - ${addr} ${status}`,
        );
      }

      await writeResponseHeader(socket, {
        status,
        date: this.clock(),
        server: this.config.serverName,
        contentType: this.config.contentType,
      });
      await this.bodyWriter.write(socket, resource);
    } catch (err) {
      this.logger.error("Output error:", err);
    } finally {
      try {
        socket.close();
      } catch (err) {
        this.logger.debug("Close failed:", err);
      }
      this.logger.debug(`Done handling connection from ${addr}`);
    }
  }

  private async readRequestLine(socket: ITcpSocket): Promise<string | null> {
    const reader = new RequestReader(socket);
    try {
      const head = await reader.readHead({
        timeoutMs: this.config.requestTimeoutMs,
        maxLineSize: this.config.maxLineSize,
      });

      this.logger.debug(`Request line: (${head.requestLine})`);
      for (const line of head.headerLines) {
        this.logger.debug(`Header line: (${line})`);
      }
      if (head.incomplete) {
        this.logger.warn("Request head incomplete:", head.incomplete.code);
      }
      return head.requestLine;
    } catch (err) {
      if (err instanceof RequestReadError) {
        this.logger.warn("Request error:", err.code, err.message);
        return null;
      }
      throw err;
    }
  }

  private async resolveSafely(
    requestLine: string | null,
  ): Promise<ResolvedResource> {
    try {
      return await this.resolver.resolve(requestLine);
    } catch (err) {
      this.logger.error("Resolution failed:", err);
      return { kind: "missing", reason: "not-found" };
    }
  }
}
