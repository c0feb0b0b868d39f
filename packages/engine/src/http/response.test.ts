import { describe, expect, it } from "vitest";
import { decodeToString, fromString } from "../utils/buffer.js";
import { HttpResponse } from "./response.js";
import { STATUS_TEXT } from "./types.js";

function contentLengthOf(serialized: Uint8Array): number {
  const text = decodeToString(serialized);
  const match = text.match(/\r\nContent-Length: (\d+)\r\n/);
  if (!match) {
    throw new Error("No Content-Length header");
  }
  return Number.parseInt(match[1], 10);
}

describe("HttpResponse", () => {
  it("serializes 200 OK with a text body", () => {
    const bytes = HttpResponse.ok().text("hi").toBytes();

    expect(decodeToString(bytes)).toBe(
      "HTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\nhi",
    );
  });

  it("serializes an empty 404", () => {
    const bytes = HttpResponse.notFound().toBytes();

    expect(decodeToString(bytes)).toBe(
      "HTTP/1.1 404 Not Found\r\nContent-Length: 0\r\n\r\n",
    );
  });

  it("emits headers after Content-Length, keeping their case", () => {
    const bytes = new HttpResponse(201, "Created")
      .header("X-Request-Id", "abc")
      .text("ok")
      .toBytes();

    expect(decodeToString(bytes)).toBe(
      "HTTP/1.1 201 Created\r\nContent-Length: 2\r\nX-Request-Id: abc\r\n\r\nok",
    );
  });

  it("replaces a header set twice under the same key", () => {
    const response = HttpResponse.ok()
      .header("Content-Type", "text/html")
      .header("Content-Type", "text/plain");

    expect([...response.headers]).toEqual([["Content-Type", "text/plain"]]);
  });

  it("ignores a caller-supplied Content-Length", () => {
    const bytes = HttpResponse.ok()
      .header("content-length", "999")
      .header("CONTENT-LENGTH", "1")
      .text("four")
      .toBytes();

    expect(decodeToString(bytes)).toBe(
      "HTTP/1.1 200 OK\r\nContent-Length: 4\r\n\r\nfour",
    );
  });

  it("counts bytes, not characters, for multi-byte text", () => {
    const response = HttpResponse.ok().text("héllo ✓");

    expect(response.bodyBytes.length).toBe(10);
    expect(contentLengthOf(response.toBytes())).toBe(10);
  });

  it("appends raw body bytes unmodified", () => {
    const body = new Uint8Array([0, 13, 10, 255, 128]);
    const bytes = HttpResponse.ok().body(body).toBytes();

    const head = fromString("HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\n");
    expect(Array.from(bytes.subarray(0, head.length))).toEqual(Array.from(head));
    expect(Array.from(bytes.subarray(head.length))).toEqual([0, 13, 10, 255, 128]);
  });

  it("always reports the length of the latest body", () => {
    for (const size of [0, 1, 17, 1024, 70_000]) {
      const response = HttpResponse.ok().text("first").body(new Uint8Array(size));
      expect(contentLengthOf(response.toBytes())).toBe(size);
    }
  });

  it("builds a plain-text 400", () => {
    const bytes = HttpResponse.badRequest("Invalid method").toBytes();

    expect(decodeToString(bytes)).toBe(
      "HTTP/1.1 400 Bad Request\r\nContent-Length: 14\r\nContent-Type: text/plain; charset=utf-8\r\n\r\nInvalid method",
    );
  });

  it("only knows the reason phrases the server emits", () => {
    expect(STATUS_TEXT).toEqual({
      200: "OK",
      400: "Bad Request",
      404: "Not Found",
    });
  });
});
