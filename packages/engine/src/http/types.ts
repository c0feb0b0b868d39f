export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE"] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export interface HttpRequest {
  readonly method: HttpMethod;
  readonly path: string;
  readonly version: string;
  /** Keys are lowercased; a repeated header keeps its last value. */
  readonly headers: ReadonlyMap<string, string>;
  /** Everything after the blank line, unchecked against Content-Length. */
  readonly body: Uint8Array;
}

export const HTTP_VERSION = "HTTP/1.1";

export const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  400: "Bad Request",
  404: "Not Found",
};
