import type { ShutdownSignal } from "../shutdown/shutdown-signal.js";

/**
 * Something outside the server (an OS signal, a test, a UI button) that
 * can ask it to stop.
 */
export interface IShutdownSource {
  /** Start forwarding interrupts to `signal`. Returns an uninstaller. */
  install(signal: ShutdownSignal): () => void;
}
