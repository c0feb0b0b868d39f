import * as net from "node:net";
import { describe, expect, it } from "vitest";
import { defaultConfig } from "../../config/server-config.js";
import { silentLogger } from "../../logging/logger.js";
import { createNodeServer } from "../../presets/node.js";
import type { WebServer } from "../../server/web-server.js";
import { NodeSocketFactory } from "./node-socket.js";

function exchange(port: number, payload: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = net.connect(port, "127.0.0.1", () => {
      socket.write(payload);
    });
    let data = "";
    socket.on("data", (chunk: Buffer) => {
      data += chunk.toString("utf8");
    });
    socket.on("close", () => resolve(data));
    socket.on("error", reject);
  });
}

function startLocalServer(): WebServer {
  return createNodeServer({
    config: {
      ...defaultConfig(),
      host: "127.0.0.1",
      port: 0,
      quiet: true,
      pollIntervalMs: 10,
      readTimeoutMs: 50,
    },
    logger: silentLogger(),
  });
}

function connectClient(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect(port, "127.0.0.1", () => resolve(socket));
    socket.once("error", reject);
  });
}

async function waitUntil(condition: () => boolean): Promise<void> {
  while (!condition()) {
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

describe("Node socket adapter (real socket)", () => {
  it(
    "serves requests on an ephemeral port until stopped",
    async () => {
      const server = createNodeServer({
        config: {
          ...defaultConfig(),
          port: 0,
          quiet: true,
          pollIntervalMs: 10,
          readTimeoutMs: 50,
        },
        logger: silentLogger(),
      });

      const { port } = await server.start();
      const running = server.run();
      try {
        expect(await exchange(port, "GET / HTTP/1.1\r\nHost: x\r\n\r\n")).toBe(
          "HTTP/1.1 200 OK\r\nContent-Length: 18\r\nContent-Type: text/plain; charset=utf-8\r\n\r\nHello from hearth\n",
        );
        expect(await exchange(port, "BREW / HTTP/1.1\r\n\r\n")).toBe(
          "HTTP/1.1 400 Bad Request\r\nContent-Length: 14\r\nContent-Type: text/plain; charset=utf-8\r\n\r\nInvalid method",
        );
      } finally {
        await server.stop();
        await running;
      }
    },
    10000,
  );

  it(
    "times out reads on an idle connection",
    async () => {
      const listener = await new NodeSocketFactory().listen("127.0.0.1", 0);
      const client = net.connect(listener.address().port, "127.0.0.1");
      try {
        await new Promise<void>((resolve) => client.once("connect", resolve));

        let connection = listener.accept();
        while (!connection) {
          await new Promise((resolve) => setTimeout(resolve, 5));
          connection = listener.accept();
        }
        connection.setReadTimeout(30);

        const buffer = new Uint8Array(4);
        expect(await connection.read(buffer)).toEqual({ timedOut: true });

        client.write("abcdef");
        expect(await connection.read(buffer)).toEqual({
          timedOut: false,
          bytesRead: 4,
        });
        expect(await connection.read(buffer)).toEqual({
          timedOut: false,
          bytesRead: 2,
        });
        connection.close();
      } finally {
        client.destroy();
        await listener.close();
      }
    },
    10000,
  );

  it(
    "reports peer-closed when the client only sends a FIN",
    async () => {
      const server = startLocalServer();
      const outcomes: string[] = [];
      server.on("connectionClosed", (outcome) => {
        outcomes.push(outcome);
        server.shutdown.request("test");
      });

      const { port } = await server.start();
      const running = server.run();
      const client = await connectClient(port);
      try {
        client.end();
        await running;

        expect(outcomes).toEqual(["peer-closed"]);
      } finally {
        client.destroy();
        await server.stop();
      }
    },
    10000,
  );

  it(
    "abandons an idle client when stopped",
    async () => {
      const server = startLocalServer();
      const outcomes: string[] = [];
      server.on("connectionClosed", (outcome) => outcomes.push(outcome));

      const { port } = await server.start();
      const running = server.run();
      const client = await connectClient(port);
      const clientClosed = new Promise<void>((resolve) =>
        client.once("close", () => resolve()),
      );
      let received = "";
      client.on("data", (chunk: Buffer) => {
        received += chunk.toString("utf8");
      });
      try {
        await waitUntil(() => server.acceptedConnections === 1);
        await server.stop();
        await running;
        await clientClosed;

        expect(outcomes).toEqual(["abandoned"]);
        expect(received).toBe("");
      } finally {
        client.destroy();
      }
    },
    10000,
  );

  it("rejects binding a port that is already in use", async () => {
    const factory = new NodeSocketFactory();
    const first = await factory.listen("127.0.0.1", 0);
    try {
      await expect(
        factory.listen("127.0.0.1", first.address().port),
      ).rejects.toThrow(/EADDRINUSE/);
    } finally {
      await first.close();
    }
  });
});
