import type { IShutdownSource } from "../../interfaces/shutdown.js";
import { NoopShutdownSource } from "../../shutdown/noop-shutdown-source.js";
import type { ShutdownSignal } from "../../shutdown/shutdown-signal.js";

type SignalListener = (signal: NodeJS.Signals) => void;

/** The slice of `process` this adapter needs. */
export interface SignalTarget {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

const POSIX_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
const WINDOWS_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGBREAK"];

const POSIX_PLATFORMS: ReadonlySet<string> = new Set([
  "linux",
  "darwin",
  "freebsd",
  "openbsd",
  "netbsd",
  "sunos",
  "aix",
]);

/**
 * Translates process signals into a shutdown request.
 */
export class NodeShutdownSource implements IShutdownSource {
  constructor(
    private readonly signals: readonly NodeJS.Signals[] = POSIX_SIGNALS,
    private readonly target: SignalTarget = process,
  ) {}

  install(signal: ShutdownSignal): () => void {
    const listener: SignalListener = (received) => {
      signal.request(received);
    };

    for (const name of this.signals) {
      this.target.on(name, listener);
    }

    return () => {
      for (const name of this.signals) {
        this.target.off(name, listener);
      }
    };
  }
}

export function createPlatformShutdownSource(
  platform: string = process.platform,
  target: SignalTarget = process,
): IShutdownSource {
  if (platform === "win32") {
    return new NodeShutdownSource(WINDOWS_SIGNALS, target);
  }
  if (POSIX_PLATFORMS.has(platform)) {
    return new NodeShutdownSource(POSIX_SIGNALS, target);
  }
  return new NoopShutdownSource();
}
