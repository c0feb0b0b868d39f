import type { ServerConfig } from "../config/server-config.js";
import type {
  IConnection,
  IListener,
  ISocketFactory,
  ListenerAddress,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { ShutdownSignal } from "../shutdown/shutdown-signal.js";
import { EventEmitter } from "../utils/event-emitter.js";
import {
  type ConnectionOutcome,
  defaultRequestHandler,
  handleConnection,
  type RequestHandler,
} from "./connection-handler.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  config: ServerConfig;
  logger?: Logger;
  handler?: RequestHandler;
  /** Shared with whatever may ask the server to stop. */
  shutdown?: ShutdownSignal;
}

export type WebServerEvents = {
  listening: [address: ListenerAddress];
  connectionClosed: [outcome: ConnectionOutcome | "failed", remote: string];
  connectionError: [error: unknown, remote: string];
  error: [error: unknown];
  close: [];
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Serves one connection at a time.
 *
 * `run()` polls the listener: a pending connection is handled to
 * completion before the next poll; when none is pending the loop sleeps
 * `pollIntervalMs` and then checks the shutdown signal. This is plain
 * fixed-interval polling, so shutdown is noticed within one interval and
 * a new connection waits at most one interval to be picked up.
 */
export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private handler: RequestHandler;
  private listener: IListener | null = null;
  private running: Promise<void> | null = null;
  private _acceptedConnections = 0;

  readonly shutdown: ShutdownSignal;

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();
    this.handler = options.handler ?? defaultRequestHandler;
    this.shutdown = options.shutdown ?? new ShutdownSignal();
  }

  get acceptedConnections(): number {
    return this._acceptedConnections;
  }

  async start(): Promise<ListenerAddress> {
    if (this.listener) {
      throw new Error("Server is already started");
    }

    this.listener = await this.socketFactory.listen(
      this.config.host,
      this.config.port,
    );
    const address = this.listener.address();
    this.logger.debug(`Listening on ${address.host}:${address.port}`);
    this.emit("listening", address);
    return address;
  }

  /**
   * Accept and serve connections until shutdown is requested.
   * Rejects with the underlying error if accepting fails.
   */
  run(): Promise<void> {
    const listener = this.listener;
    if (!listener) {
      return Promise.reject(new Error("Server is not started"));
    }
    if (this.running) {
      return Promise.reject(new Error("Server is already running"));
    }

    const running = this.acceptLoop(listener).finally(() => {
      this.running = null;
    });
    this.running = running;
    return running;
  }

  async stop(): Promise<void> {
    this.shutdown.request("stop");

    const running = this.running;
    if (running) {
      try {
        await running;
      } catch (err) {
        this.logger.debug("Accept loop had already failed:", err);
      }
    }

    const listener = this.listener;
    this.listener = null;
    if (listener) {
      await listener.close();
    }
    this.emit("close");
  }

  private async acceptLoop(listener: IListener): Promise<void> {
    while (true) {
      let connection: IConnection | null;
      try {
        connection = listener.accept();
      } catch (err) {
        this.logger.error("Accept failed:", err);
        this.emit("error", err);
        throw err;
      }

      if (connection) {
        this._acceptedConnections++;
        await this.serveConnection(connection);
        continue;
      }

      await sleep(this.config.pollIntervalMs);
      if (this.shutdown.requested) {
        this.logger.debug(`Accept loop stopping (${this.shutdown.reason})`);
        return;
      }
    }
  }

  /** Failures stay with the connection that caused them. */
  private async serveConnection(connection: IConnection): Promise<void> {
    const remote = connection.remoteAddress ?? "?";
    let outcome: ConnectionOutcome | "failed" = "failed";

    try {
      outcome = await handleConnection(connection, {
        shutdown: this.shutdown,
        readTimeoutMs: this.config.readTimeoutMs,
        readBufferSize: this.config.readBufferSize,
        handler: this.handler,
        logger: this.logger,
        quiet: this.config.quiet,
      });
    } catch (err) {
      this.logger.error(`Connection from ${remote} failed:`, err);
      this.emit("connectionError", err, remote);
    } finally {
      try {
        connection.close();
      } catch (err) {
        this.logger.debug("Close failed:", err);
      }
    }

    this.emit("connectionClosed", outcome, remote);
  }
}
