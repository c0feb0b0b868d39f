#!/usr/bin/env node
import * as fs from "node:fs";
import {
  basicLogger,
  createNodeServer,
  createPlatformShutdownSource,
  defaultConfig,
  filteredLogger,
  prefixedLogger,
  type ServerConfig,
} from "@hearth/engine";
import {
  type CliCommand,
  type CliOptions,
  CliUsageError,
  parseArgs,
  USAGE,
} from "./args.js";

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(new URL("../package.json", import.meta.url), "utf8"),
  );
  if (
    manifest &&
    typeof manifest === "object" &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  return "unknown";
}

function toConfig(options: CliOptions): ServerConfig {
  const defaults = defaultConfig();
  return {
    host: options.host,
    port: options.port,
    pollIntervalMs: options.pollIntervalMs ?? defaults.pollIntervalMs,
    readTimeoutMs: options.readTimeoutMs ?? defaults.readTimeoutMs,
    readBufferSize: options.readBufferSize ?? defaults.readBufferSize,
    quiet: options.quiet,
  };
}

async function serve(options: CliOptions): Promise<void> {
  const logger = filteredLogger(
    options.logLevel,
    prefixedLogger("hearth", basicLogger()),
  );
  const config = toConfig(options);
  const server = createNodeServer({ config, logger });

  const { host, port } = await server.start();
  console.log(`\n  hearth listening on http://${host}:${port}\n`);

  const uninstall = createPlatformShutdownSource().install(server.shutdown);
  server.shutdown.onRequested((reason) => {
    console.log(`\nShutting down (${reason})...`);
  });

  try {
    await server.run();
  } finally {
    uninstall();
    await server.stop();
  }
}

async function main(): Promise<void> {
  let command: CliCommand;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      console.log(USAGE);
      process.exit(1);
    }
    throw err;
  }

  switch (command.kind) {
    case "help":
      console.log(USAGE);
      return;
    case "version":
      console.log(readVersion());
      return;
    case "serve":
      await serve(command.options);
      return;
  }
}

main().then(
  () => process.exit(0),
  (err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  },
);
