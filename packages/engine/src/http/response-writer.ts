import type { IConnection } from "../interfaces/socket.js";
import type {
  HttpRequestParseError,
  HttpRequestParseErrorCode,
} from "./request-parser.js";
import { HttpResponse } from "./response.js";

const PARSE_ERROR_BODY: Record<HttpRequestParseErrorCode, string> = {
  INVALID_REQUEST: "Invalid request",
  INVALID_METHOD: "Invalid method",
  MISSING_REQUEST_LINE: "Missing request line",
};

/**
 * Serialize a response and write it in full.
 */
export async function writeResponse(
  connection: IConnection,
  response: HttpResponse,
): Promise<void> {
  await connection.write(response.toBytes());
}

export function responseForParseError(err: HttpRequestParseError): HttpResponse {
  return HttpResponse.badRequest(PARSE_ERROR_BODY[err.code]);
}
