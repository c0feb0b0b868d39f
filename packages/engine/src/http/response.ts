import { concat, fromString } from "../utils/buffer.js";
import { HTTP_VERSION, STATUS_TEXT } from "./types.js";

/**
 * An HTTP response built up fluently.
 *
 * Header keys keep the case they were given. Content-Length is never
 * stored: {@link HttpResponse.toBytes} derives it from the body.
 */
export class HttpResponse {
  private readonly headerMap = new Map<string, string>();
  private payload: Uint8Array = new Uint8Array(0);

  constructor(
    readonly status: number,
    readonly statusText: string,
  ) {}

  static ok(): HttpResponse {
    return new HttpResponse(200, STATUS_TEXT[200]);
  }

  static notFound(): HttpResponse {
    return new HttpResponse(404, STATUS_TEXT[404]);
  }

  static badRequest(message: string): HttpResponse {
    return new HttpResponse(400, STATUS_TEXT[400])
      .header("Content-Type", "text/plain; charset=utf-8")
      .text(message);
  }

  get headers(): ReadonlyMap<string, string> {
    return this.headerMap;
  }

  get bodyBytes(): Uint8Array {
    return this.payload;
  }

  header(key: string, value: string): this {
    this.headerMap.set(key, value);
    return this;
  }

  body(bytes: Uint8Array): this {
    this.payload = bytes;
    return this;
  }

  text(content: string): this {
    this.payload = fromString(content);
    return this;
  }

  toBytes(): Uint8Array {
    const lines: string[] = [
      `${HTTP_VERSION} ${this.status} ${this.statusText}`,
      `Content-Length: ${this.payload.length}`,
    ];
    for (const [key, value] of this.headerMap) {
      if (key.toLowerCase() === "content-length") continue;
      lines.push(`${key}: ${value}`);
    }
    lines.push("", ""); // \r\n\r\n
    return concat([fromString(lines.join("\r\n")), this.payload]);
  }
}
