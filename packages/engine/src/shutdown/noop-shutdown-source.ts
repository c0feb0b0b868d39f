import type { IShutdownSource } from "../interfaces/shutdown.js";

/** For hosts with no interrupt hook: the server runs until killed. */
export class NoopShutdownSource implements IShutdownSource {
  install(): () => void {
    return () => {};
  }
}
