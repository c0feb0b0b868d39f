type ShutdownListener = (reason: string) => void;

/**
 * Cooperative cancellation token shared by the accept loop and the
 * connection read loop. Both poll {@link ShutdownSignal.requested} at their
 * suspension points; nothing is interrupted preemptively.
 *
 * JavaScript runs signal listeners on the same thread as the loops, so a
 * plain field is read and written without tearing.
 */
export class ShutdownSignal {
  private _reason: string | null = null;
  private listeners: Set<ShutdownListener> = new Set();

  get requested(): boolean {
    return this._reason !== null;
  }

  get reason(): string | null {
    return this._reason;
  }

  request(reason = "requested"): void {
    if (this._reason !== null) return;
    this._reason = reason;

    for (const listener of [...this.listeners]) {
      try {
        listener(reason);
      } catch (e) {
        console.error("Shutdown listener error:", e);
      }
    }
  }

  onRequested(listener: ShutdownListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }
}
