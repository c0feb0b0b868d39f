import { describe, expect, it } from "vitest";
import { CliUsageError, parseArgs, parsePort } from "./args.js";

describe("parseArgs", () => {
  it("takes host and port positionally", () => {
    expect(parseArgs(["127.0.0.1", "8080"])).toEqual({
      kind: "serve",
      options: {
        host: "127.0.0.1",
        port: 8080,
        pollIntervalMs: undefined,
        readTimeoutMs: undefined,
        readBufferSize: undefined,
        quiet: false,
        logLevel: "info",
      },
    });
  });

  it("reads tuning flags", () => {
    const command = parseArgs([
      "--poll-interval",
      "25",
      "0.0.0.0",
      "3000",
      "--read-timeout",
      "750",
      "--buffer-size",
      "4096",
      "-q",
      "--log-level",
      "WARN",
    ]);

    expect(command).toEqual({
      kind: "serve",
      options: {
        host: "0.0.0.0",
        port: 3000,
        pollIntervalMs: 25,
        readTimeoutMs: 750,
        readBufferSize: 4096,
        quiet: true,
        logLevel: "warn",
      },
    });
  });

  it("maps --verbose to debug logging", () => {
    const command = parseArgs(["::1", "0", "--verbose"]);

    expect(command.kind === "serve" && command.options.logLevel).toBe("debug");
  });

  it("returns help and version commands", () => {
    expect(parseArgs(["--help"])).toEqual({ kind: "help" });
    expect(parseArgs(["localhost", "-v"])).toEqual({ kind: "version" });
  });

  it("requires both host and port", () => {
    expect(() => parseArgs([])).toThrow("Missing required argument: <host>");
    expect(() => parseArgs(["localhost"])).toThrow(
      "Missing required argument: <port>",
    );
  });

  it("rejects extra positionals and unknown flags", () => {
    expect(() => parseArgs(["a", "1", "b"])).toThrow("Unexpected argument: b");
    expect(() => parseArgs(["a", "1", "--cors"])).toThrow(
      "Unknown option: --cors",
    );
  });

  it("rejects malformed tuning values", () => {
    expect(() => parseArgs(["a", "1", "--read-timeout"])).toThrow(
      "--read-timeout requires a value",
    );
    expect(() => parseArgs(["a", "1", "--buffer-size", "0"])).toThrow(
      "--buffer-size must be a positive integer: 0",
    );
    expect(() => parseArgs(["a", "1", "--log-level", "loud"])).toThrow(
      "Invalid log level: loud",
    );
  });
});

describe("parsePort", () => {
  it("accepts the full unsigned 16-bit range", () => {
    expect(parsePort("0")).toBe(0);
    expect(parsePort("65535")).toBe(65535);
  });

  it("rejects values outside it", () => {
    expect(() => parsePort("65536")).toThrow(CliUsageError);
    expect(() => parsePort("-1")).toThrow("Invalid port: -1");
    expect(() => parsePort("80a")).toThrow("Invalid port: 80a");
    expect(() => parsePort("")).toThrow("Invalid port: ");
  });
});
