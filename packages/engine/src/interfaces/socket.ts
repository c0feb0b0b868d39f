/**
 * Abstract Socket Interfaces
 *
 * These interfaces decouple the server engine from any specific runtime.
 * They model a synchronous-style transport: a listener that is polled for
 * pending connections, and connections read with a timeout.
 */

export type ReadResult =
  | { timedOut: false; bytesRead: number }
  | { timedOut: true };

export interface IConnection {
  /** Bound how long a single read may wait for data. */
  setReadTimeout(ms: number): void;

  /**
   * Read into `buffer`. Resolves with the number of bytes copied (0 once
   * the peer has closed), or a timeout marker. Rejects on I/O error.
   */
  read(buffer: Uint8Array): Promise<ReadResult>;

  /** Write all of `data`, resolving once it has been flushed. */
  write(data: Uint8Array): Promise<void>;

  /** Close the connection. */
  close(): void;

  /** Remote peer address. */
  remoteAddress?: string;
}

export interface ListenerAddress {
  host: string;
  port: number;
}

export interface IListener {
  /**
   * Take the next pending connection without waiting.
   * Returns null when none is pending; throws on any other failure.
   */
  accept(): IConnection | null;

  /** The address the listener is bound to. */
  address(): ListenerAddress;

  /** Stop listening. */
  close(): Promise<void>;
}

export interface ISocketFactory {
  /** Bind and listen. Rejects if the address cannot be bound. */
  listen(host: string, port: number): Promise<IListener>;
}
