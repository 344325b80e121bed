import { ResourceExhaustedError } from "./errors";

export const DEFAULT_MAX_CONCURRENT_STREAMS = 16;

/**
 * Caps how many pollers may run at once. `acquire` fails synchronously when
 * the cap is reached; the returned release function is idempotent.
 */
export class StreamPool {
  readonly maxConcurrent: number;
  private activeCount = 0;

  constructor(maxConcurrent: number = DEFAULT_MAX_CONCURRENT_STREAMS) {
    this.maxConcurrent = Number.isFinite(maxConcurrent) ? Math.max(1, Math.floor(maxConcurrent)) : Number.POSITIVE_INFINITY;
  }

  get active(): number {
    return this.activeCount;
  }

  get available(): number {
    return this.maxConcurrent - this.activeCount;
  }

  acquire(): () => void {
    if (this.activeCount >= this.maxConcurrent) {
      throw new ResourceExhaustedError(`stream pool exhausted (${this.activeCount}/${this.maxConcurrent} pollers running)`);
    }
    this.activeCount += 1;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.activeCount -= 1;
    };
  }
}

export const defaultStreamPool = new StreamPool();
