import { decodeUtf8Strict, findSequence } from "../utils/buffer.js";
import { HTTP_METHODS, type HttpMethod, type HttpRequest } from "./types.js";

const CRLF_CRLF = new Uint8Array([13, 10, 13, 10]); // \r\n\r\n
const HEADER_SEPARATOR = ": ";
// Unicode White_Space. Unlike \s this includes U+0085 and excludes U+FEFF.
const WHITESPACE_RUN =
  /[\t\n\v\f\r \u0085\u00a0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/;

export type HttpRequestParseErrorCode =
  | "INVALID_REQUEST"
  | "INVALID_METHOD"
  | "MISSING_REQUEST_LINE";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

function toMethod(token: string): HttpMethod | null {
  return HTTP_METHODS.find((method) => method === token) ?? null;
}

function splitLines(block: string): string[] {
  return block
    .split("\n")
    .map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Parse one request out of the bytes of a single read.
 *
 * Deliberately minimal: no header folding, no chunked bodies, no
 * percent-decoding and no check that the body matches Content-Length.
 * Throws {@link HttpRequestParseError} on the first problem found.
 */
export function parseHttpRequest(bytes: Uint8Array): HttpRequest {
  if (decodeUtf8Strict(bytes) === null) {
    throw new HttpRequestParseError(
      "INVALID_REQUEST",
      "Request is not valid UTF-8",
    );
  }

  const separatorIndex = findSequence(bytes, CRLF_CRLF);
  if (separatorIndex === -1) {
    throw new HttpRequestParseError(
      "INVALID_REQUEST",
      "Missing blank line after headers",
    );
  }

  // Both halves sit on ASCII boundaries of a valid UTF-8 buffer.
  const headerBlock = decodeUtf8Strict(bytes.subarray(0, separatorIndex)) ?? "";
  const body = bytes.slice(separatorIndex + CRLF_CRLF.length);

  const lines = splitLines(headerBlock);
  const tokens = (lines[0] ?? "").split(WHITESPACE_RUN).filter((t) => t.length > 0);

  if (tokens.length === 0) {
    throw new HttpRequestParseError(
      "MISSING_REQUEST_LINE",
      "Missing request line",
    );
  }
  if (tokens.length < 3) {
    throw new HttpRequestParseError(
      "INVALID_REQUEST",
      "Malformed request line",
    );
  }

  const [methodToken, path, version] = tokens;
  const method = toMethod(methodToken);
  if (method === null) {
    throw new HttpRequestParseError(
      "INVALID_METHOD",
      `Unsupported method: ${methodToken}`,
    );
  }

  const headers = new Map<string, string>();
  for (const line of lines.slice(1)) {
    const splitAt = line.indexOf(HEADER_SEPARATOR);
    if (splitAt === -1) continue;
    const key = line.substring(0, splitAt).toLowerCase();
    const value = line.substring(splitAt + HEADER_SEPARATOR.length);
    headers.set(key, value);
  }

  return { method, path, version, headers, body };
}
