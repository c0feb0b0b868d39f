import { HttpRequestParseError, parseHttpRequest } from "../http/request-parser.js";
import { HttpResponse } from "../http/response.js";
import {
  responseForParseError,
  writeResponse,
} from "../http/response-writer.js";
import type { HttpRequest } from "../http/types.js";
import type { IConnection } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import type { ShutdownSignal } from "../shutdown/shutdown-signal.js";

export type RequestHandler = (request: HttpRequest) => HttpResponse;

/**
 * - `responded`: exactly one response was written.
 * - `abandoned`: shutdown was requested while waiting for data.
 * - `peer-closed`: the peer closed before sending anything.
 */
export type ConnectionOutcome = "responded" | "abandoned" | "peer-closed";

export interface HandleConnectionOptions {
  shutdown: ShutdownSignal;
  readTimeoutMs: number;
  readBufferSize: number;
  handler: RequestHandler;
  logger: Logger;
  quiet?: boolean;
}

export const defaultRequestHandler: RequestHandler = (request) => {
  if (request.path === "/") {
    return HttpResponse.ok()
      .header("Content-Type", "text/plain; charset=utf-8")
      .text("Hello from hearth\n");
  }
  return HttpResponse.notFound()
    .header("Content-Type", "text/plain; charset=utf-8")
    .text("Not Found\n");
};

/**
 * Read one request from `connection`, answer it, and return.
 *
 * Each read waits at most `readTimeoutMs`; a timeout is a chance to
 * notice shutdown, otherwise the read is retried. Read and write errors
 * propagate. The caller closes the connection.
 */
export async function handleConnection(
  connection: IConnection,
  options: HandleConnectionOptions,
): Promise<ConnectionOutcome> {
  const { shutdown, logger } = options;

  connection.setReadTimeout(options.readTimeoutMs);
  const buffer = new Uint8Array(options.readBufferSize);

  let bytesRead: number;
  while (true) {
    const result = await connection.read(buffer);
    if (!result.timedOut) {
      bytesRead = result.bytesRead;
      break;
    }
    if (shutdown.requested) {
      logger.debug("Abandoning connection: shutdown requested");
      return "abandoned";
    }
  }

  if (bytesRead === 0) {
    return "peer-closed";
  }

  let response: HttpResponse;
  try {
    const request = parseHttpRequest(buffer.subarray(0, bytesRead));
    if (!options.quiet) {
      const addr = connection.remoteAddress ?? "?";
      logger.info(`${request.method} ${request.path} - ${addr}`);
    }
    response = options.handler(request);
  } catch (err) {
    if (!(err instanceof HttpRequestParseError)) {
      throw err;
    }
    logger.debug(`Rejecting request (${err.code}): ${err.message}`);
    response = responseForParseError(err);
  }

  await writeResponse(connection, response);
  return "responded";
}
