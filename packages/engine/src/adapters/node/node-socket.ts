import * as net from "node:net";
import type {
  IConnection,
  IListener,
  ISocketFactory,
  ListenerAddress,
  ReadResult,
} from "../../interfaces/socket.js";

const DEFAULT_READ_TIMEOUT_MS = 500;

/**
 * A paused `net.Socket` read on demand. The socket only flows while a
 * read is waiting, so unread bytes stay in the kernel or in `pending`.
 */
export class NodeConnection implements IConnection {
  private socket: net.Socket;
  private readTimeoutMs = DEFAULT_READ_TIMEOUT_MS;
  private pending: Uint8Array[] = [];
  private ended = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: net.Socket) {
    this.socket = socket;
    this.socket.pause();

    this.socket.on("data", (data: Buffer) => {
      this.pending.push(new Uint8Array(data));
      this.socket.pause();
      this.notifyWaiters();
    });

    this.socket.on("end", () => {
      this.ended = true;
      this.notifyWaiters();
    });

    this.socket.on("error", (err) => {
      this.socketError = err;
      this.notifyWaiters();
    });
  }

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  setReadTimeout(ms: number): void {
    this.readTimeoutMs = ms;
  }

  async read(buffer: Uint8Array): Promise<ReadResult> {
    while (true) {
      if (this.pending.length > 0) {
        return { timedOut: false, bytesRead: this.drainInto(buffer) };
      }

      if (this.socketError) {
        throw this.socketError;
      }

      if (this.ended || this.socket.destroyed) {
        return { timedOut: false, bytesRead: 0 };
      }

      this.socket.resume();
      const hadActivity = await this.waitForActivity(this.readTimeoutMs);
      if (!hadActivity) {
        this.socket.pause();
        return { timedOut: true };
      }
    }
  }

  write(data: Uint8Array): Promise<void> {
    if (this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(new Error("Socket is not writable"));
    }

    return new Promise((resolve, reject) => {
      this.socket.write(data, (err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  close(): void {
    this.socket.destroy();
  }

  private drainInto(buffer: Uint8Array): number {
    let written = 0;
    while (written < buffer.length && this.pending.length > 0) {
      const chunk = this.pending[0];
      const take = Math.min(buffer.length - written, chunk.length);
      buffer.set(chunk.subarray(0, take), written);
      written += take;
      if (take === chunk.length) {
        this.pending.shift();
      } else {
        this.pending[0] = chunk.subarray(take);
      }
    }
    return written;
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

/**
 * A listening `net.Server` whose connections are queued until polled.
 * Sockets are accepted paused so nothing is read before the handler asks.
 */
export class NodeListener implements IListener {
  private queue: NodeConnection[] = [];
  private serverError: Error | null = null;

  constructor(private readonly server: net.Server) {
    this.server.on("connection", (socket: net.Socket) => {
      this.queue.push(new NodeConnection(socket));
    });

    this.server.on("error", (err: Error) => {
      this.serverError = err;
    });
  }

  accept(): IConnection | null {
    if (this.serverError) {
      throw this.serverError;
    }

    return this.queue.shift() ?? null;
  }

  address(): ListenerAddress {
    const addr = this.server.address();
    if (addr && typeof addr === "object") {
      return { host: addr.address, port: addr.port };
    }
    throw new Error("Listener is not bound to a TCP address");
  }

  close(): Promise<void> {
    for (const connection of this.queue) {
      connection.close();
    }
    this.queue = [];

    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err && !("code" in err && err.code === "ERR_SERVER_NOT_RUNNING")) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }
}

export class NodeSocketFactory implements ISocketFactory {
  listen(host: string, port: number): Promise<IListener> {
    const server = net.createServer({ pauseOnConnect: true });

    return new Promise((resolve, reject) => {
      const onBindError = (err: Error) => {
        reject(err);
      };

      server.once("error", onBindError);
      server.listen(port, host, () => {
        server.off("error", onBindError);
        resolve(new NodeListener(server));
      });
    });
  }
}
