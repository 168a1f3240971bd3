// Node adapters
export {
  NodeFileHandle,
  NodeFileSystem,
  NodeHostIdentity,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export { MalformedRequestError, parseRequestPath } from "./http/request-line.js";
export type {
  ReadRequestOptions,
  RequestHead,
  RequestReadErrorCode,
} from "./http/request-reader.js";
export {
  RequestReader,
  RequestReadError,
  readRequestHead,
} from "./http/request-reader.js";
export {
  buildHeaderBytes,
  FileStreamError,
  streamFileBody,
  writeResponseHeader,
} from "./http/response-writer.js";
export type { TemplateValues } from "./http/template.js";
export {
  DATE_TOKEN,
  formatServerIdentity,
  formatTemplateTimestamp,
  renderTemplate,
  SERVER_TOKEN,
} from "./http/template.js";
export type {
  MissingReason,
  ResolvedResource,
  ResponseHeader,
  ResponseStatus,
} from "./http/types.js";
export { STATUS_TEXT, statusFor } from "./http/types.js";
export type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export type { IHostIdentity } from "./interfaces/host-identity.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { LogEntry, Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  LogStore,
  prefixedLogger,
  storeLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type { RequestHandlerOptions } from "./server/request-handler.js";
export { RequestHandler } from "./server/request-handler.js";
export type { ResourceResolverOptions } from "./server/resource-resolver.js";
export { ResourceResolver } from "./server/resource-resolver.js";
export type {
  ResponseBodyErrorCode,
  ResponseBodyWriterOptions,
} from "./server/response-body-writer.js";
export {
  BODY_ERROR_FRAGMENT,
  readFileContents,
  ResponseBodyError,
  ResponseBodyWriter,
} from "./server/response-body-writer.js";
export type {
  WebServerEvents,
  WebServerOptions,
} from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export type { FileFault } from "./testing/in-memory-filesystem.js";
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export type { InMemoryRequestOptions } from "./testing/in-memory-socket-factory.js";
export {
  InMemorySocketFactory,
  InMemoryTcpSocket,
} from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export type { EventMap, Listener } from "./utils/event-emitter.js";
export { EventEmitter } from "./utils/event-emitter.js";
