import { type LogLevel, parseLogLevel } from "@hearth/engine";

export interface CliOptions {
  host: string;
  port: number;
  pollIntervalMs?: number;
  readTimeoutMs?: number;
  readBufferSize?: number;
  quiet: boolean;
  logLevel: LogLevel;
}

export type CliCommand =
  | { kind: "serve"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const MAX_PORT = 65535;

/** Parse a TCP port: a decimal integer in 0..65535. */
export function parsePort(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new CliUsageError(`Invalid port: ${value}`);
  }
  const port = Number.parseInt(value, 10);
  if (port > MAX_PORT) {
    throw new CliUsageError(`Port out of range (0-${MAX_PORT}): ${value}`);
  }
  return port;
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  if (value === undefined) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) === 0) {
    throw new CliUsageError(`${flag} must be a positive integer: ${value}`);
  }
  return Number.parseInt(value, 10);
}

export function parseArgs(args: string[]): CliCommand {
  const positionals: string[] = [];
  let pollIntervalMs: number | undefined;
  let readTimeoutMs: number | undefined;
  let readBufferSize: number | undefined;
  let quiet = false;
  let logLevel: LogLevel = "info";

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--poll-interval") {
      pollIntervalMs = parsePositiveInt(arg, args[++i]);
    } else if (arg === "--read-timeout") {
      readTimeoutMs = parsePositiveInt(arg, args[++i]);
    } else if (arg === "--buffer-size") {
      readBufferSize = parsePositiveInt(arg, args[++i]);
    } else if (arg === "--log-level") {
      const value = args[++i];
      const level = value === undefined ? null : parseLogLevel(value);
      if (!level) {
        throw new CliUsageError(`Invalid log level: ${value ?? ""}`);
      }
      logLevel = level;
    } else if (arg === "--verbose" || arg === "-V") {
      logLevel = "debug";
    } else if (arg === "--quiet" || arg === "-q") {
      quiet = true;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (!arg.startsWith("-")) {
      positionals.push(arg);
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  const [host, portText, ...extra] = positionals;
  if (host === undefined) {
    throw new CliUsageError("Missing required argument: <host>");
  }
  if (portText === undefined) {
    throw new CliUsageError("Missing required argument: <port>");
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected argument: ${extra[0]}`);
  }

  return {
    kind: "serve",
    options: {
      host,
      port: parsePort(portText),
      pollIntervalMs,
      readTimeoutMs,
      readBufferSize,
      quiet,
      logLevel,
    },
  };
}

export const USAGE = `
hearth - answer HTTP requests one connection at a time

Usage: hearth <host> <port> [options]

Options:
  --poll-interval <ms>   Sleep between accept attempts (default: 100)
  --read-timeout <ms>    Per-read timeout before rechecking shutdown (default: 500)
  --buffer-size <bytes>  Request read buffer size (default: 1024)
  --log-level <level>    debug, info, warn or error (default: info)
  --verbose, -V          Same as --log-level debug
  --quiet, -q            Suppress request logging
  --version, -v          Show version
  --help, -h             Show this help
`;
