const ACTIVE = 0;
const CANCELLED = 1;

/**
 * Single-writer cancellation flag.
 *
 * The state lives in a `SharedArrayBuffer` so a poller running on another
 * thread can read it with `Atomics.load` while the consumer writes it.
 * Listeners are local to the thread that registered them.
 */
export class CancellationToken {
  private readonly shared: SharedArrayBuffer;
  private readonly cell: Int32Array;
  private listeners = new Set<() => void>();

  constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
    this.shared = buffer;
    this.cell = new Int32Array(buffer, 0, 1);
  }

  /** Read-side view over a buffer created elsewhere (e.g. handed to a worker). */
  static fromShared(buffer: SharedArrayBuffer): CancellationToken {
    return new CancellationToken(buffer);
  }

  get buffer(): SharedArrayBuffer {
    return this.shared;
  }

  get isCancelled(): boolean {
    return Atomics.load(this.cell, 0) === CANCELLED;
  }

  /** Returns true only for the call that performed the transition. */
  cancel(): boolean {
    const previous = Atomics.compareExchange(this.cell, 0, ACTIVE, CANCELLED);
    if (previous !== ACTIVE) {
      return false;
    }
    this.notify();
    return true;
  }

  /**
   * Re-checks the shared cell and fires local listeners if another thread
   * cancelled since the last check.
   */
  poll(): boolean {
    if (this.isCancelled) {
      this.notify();
      return true;
    }
    return false;
  }

  onCancel(listener: () => void): () => void {
    if (this.isCancelled) {
      listener();
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    if (this.listeners.size === 0) return;
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      try {
        listener();
      } catch (error) {
        console.error("[tokenpipe] cancellation listener threw:", error);
      }
    }
  }
}

/** Links an AbortSignal to a token; returns the unlink function. */
export function linkAbortSignal(token: CancellationToken, signal: AbortSignal): () => void {
  if (signal.aborted) {
    token.cancel();
    return () => {};
  }
  const onAbort = () => {
    token.cancel();
  };
  signal.addEventListener("abort", onAbort, { once: true });
  return () => signal.removeEventListener("abort", onAbort);
}
