export interface ServerConfig {
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Port to listen on. Default: 8080 */
  port: number;
  /** Sleep between accept attempts when nothing is pending. Default: 100ms */
  pollIntervalMs: number;
  /** How long one read waits before rechecking for shutdown. Default: 500ms */
  readTimeoutMs: number;
  /** Bytes read from a connection before parsing. Default: 1KB */
  readBufferSize: number;
  /** Suppress request logging. Default: false */
  quiet: boolean;
}

export function defaultConfig(): ServerConfig {
  return {
    host: "127.0.0.1",
    port: 8080,
    pollIntervalMs: 100,
    readTimeoutMs: 500,
    readBufferSize: 1024,
    quiet: false,
  };
}
