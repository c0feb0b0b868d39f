// Node adapters
export {
  createPlatformShutdownSource,
  NodeShutdownSource,
  type SignalTarget,
} from "./adapters/node/node-shutdown-source.js";
export {
  NodeConnection,
  NodeListener,
  NodeSocketFactory,
} from "./adapters/node/node-socket.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export {
  HttpRequestParseError,
  type HttpRequestParseErrorCode,
  parseHttpRequest,
} from "./http/request-parser.js";
export { HttpResponse } from "./http/response.js";
export {
  responseForParseError,
  writeResponse,
} from "./http/response-writer.js";
export type { HttpMethod, HttpRequest } from "./http/types.js";
export { HTTP_METHODS, HTTP_VERSION, STATUS_TEXT } from "./http/types.js";
// Interfaces
export type { IShutdownSource } from "./interfaces/shutdown.js";
export type {
  IConnection,
  IListener,
  ISocketFactory,
  ListenerAddress,
  ReadResult,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  LOG_LEVELS,
  parseLogLevel,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type {
  ConnectionOutcome,
  HandleConnectionOptions,
  RequestHandler,
} from "./server/connection-handler.js";
export {
  defaultRequestHandler,
  handleConnection,
} from "./server/connection-handler.js";
export type {
  WebServerEvents,
  WebServerOptions,
} from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Shutdown
export { NoopShutdownSource } from "./shutdown/noop-shutdown-source.js";
export { ShutdownSignal } from "./shutdown/shutdown-signal.js";
// Testing
export {
  InMemoryConnection,
  InMemoryListener,
  InMemorySocketFactory,
  type ScriptedRead,
} from "./testing/in-memory-socket-factory.js";
// Utils
export {
  concat,
  decodeToString,
  decodeUtf8Strict,
  fromString,
} from "./utils/buffer.js";
export type { EventMap, Listener } from "./utils/event-emitter.js";
export { EventEmitter } from "./utils/event-emitter.js";
