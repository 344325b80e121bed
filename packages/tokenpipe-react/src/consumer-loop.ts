import { type Batch, type BatchSource, type NowFn, debugLog, getDefaultNow, isTerminalOutcome } from "@tokenpipe/core";

type RafFn = (callback: (time: number) => void) => number;
type CancelRafFn = (handle: number) => void;

export type ConsumerBatchStrategy = "rAF" | "timeout" | "microtask";

export interface ConsumerLoopOptions {
  /** How turns are scheduled. Defaults to `rAF`, falling back to `timeout` without one. */
  batch?: ConsumerBatchStrategy;
  raf?: RafFn | null;
  cancelRaf?: CancelRafFn | null;
  timeoutMs?: number;
  now?: NowFn;
}

export interface ConsumerTurnResult {
  batchCount: number;
  outcomeCount: number;
  durationMs: number;
  /** A terminal outcome was applied during this turn. */
  terminal: boolean;
  /** The stream is closed and fully drained; no further turns follow. */
  closed: boolean;
}

const DEFAULT_TIMEOUT_MS = 16;

function getDefaultRaf(): RafFn | null {
  if (typeof globalThis.requestAnimationFrame === "function") {
    return globalThis.requestAnimationFrame.bind(globalThis);
  }
  return null;
}

function getDefaultCancelRaf(): CancelRafFn | null {
  if (typeof globalThis.cancelAnimationFrame === "function") {
    return globalThis.cancelAnimationFrame.bind(globalThis);
  }
  return null;
}

/**
 * Applies batches from a stream on the host's own schedule.
 *
 * A turn is requested only when the source signals readable data. Each turn
 * drains every batch available at that moment, applies them in order and
 * returns; it never waits for more. Once the source is closed and drained the
 * loop detaches and `whenClosed()` resolves.
 */
export class ConsumerLoop<T> {
  private readonly source: BatchSource<T>;
  private readonly onBatch: (batch: Batch<T>) => void;
  private readonly onTurn?: (result: ConsumerTurnResult) => void;
  private readonly now: NowFn;
  private readonly raf: RafFn | null;
  private readonly cancelRaf: CancelRafFn | null;
  private readonly timeoutMs: number;
  private readonly strategy: ConsumerBatchStrategy;

  private unsubscribe: (() => void) | null = null;
  private cancelScheduled: (() => void) | null = null;
  private scheduleToken = 0;
  private running = false;
  private finished = false;
  private turns = 0;
  private resolveClosed: () => void = () => {};
  private readonly closedPromise: Promise<void>;

  constructor(params: {
    source: BatchSource<T>;
    onBatch: (batch: Batch<T>) => void;
    onTurn?: (result: ConsumerTurnResult) => void;
    options?: ConsumerLoopOptions;
  }) {
    this.source = params.source;
    this.onBatch = params.onBatch;
    this.onTurn = params.onTurn;
    const options = params.options ?? {};
    this.now = options.now ?? getDefaultNow();
    this.raf = options.raf === undefined ? getDefaultRaf() : options.raf;
    this.cancelRaf = options.cancelRaf === undefined ? getDefaultCancelRaf() : options.cancelRaf;
    this.timeoutMs = Math.max(0, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    const requested = options.batch ?? "rAF";
    if (requested === "rAF") {
      this.strategy = this.raf ? "rAF" : "timeout";
    } else if (requested === "microtask" && typeof queueMicrotask !== "function") {
      this.strategy = this.raf ? "rAF" : "timeout";
    } else {
      this.strategy = requested;
    }
    this.closedPromise = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isClosed(): boolean {
    return this.finished;
  }

  get turnCount(): number {
    return this.turns;
  }

  /** Subscribes to the source and schedules a first turn for anything already buffered. */
  start(): void {
    if (this.running || this.finished) return;
    this.running = true;
    this.unsubscribe = this.source.onReadable(() => this.schedule());
    this.schedule();
  }

  /** Detaches without draining. Buffered batches stay in the source. */
  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.clearScheduled();
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  whenClosed(): Promise<void> {
    return this.closedPromise;
  }

  /** Runs one turn synchronously. Safe to call outside the schedule. */
  runTurn(): ConsumerTurnResult {
    const startedAt = this.now();
    const batches = this.source.pollBatches();
    let outcomeCount = 0;
    let terminal = false;
    for (const batch of batches) {
      outcomeCount += batch.outcomes.length;
      if (batch.outcomes.some(isTerminalOutcome)) {
        terminal = true;
      }
      try {
        this.onBatch(batch);
      } catch (error) {
        console.error("[tokenpipe:consumer] batch handler failed", error);
      }
    }
    this.turns += 1;
    const closed = this.source.closed;
    const result: ConsumerTurnResult = {
      batchCount: batches.length,
      outcomeCount,
      durationMs: this.now() - startedAt,
      terminal,
      closed,
    };
    if (batches.length > 0) {
      debugLog("consumer", "turn applied batches", { batches: batches.length, outcomes: outcomeCount });
    }
    if (this.onTurn && (batches.length > 0 || (closed && !this.finished))) {
      try {
        this.onTurn(result);
      } catch (error) {
        console.error("[tokenpipe:consumer] onTurn callback failed", error);
      }
    }
    if (closed) {
      this.finish();
    }
    return result;
  }

  private finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.stop();
    this.resolveClosed();
  }

  private schedule(): void {
    if (!this.running || this.cancelScheduled) {
      return;
    }
    const token = ++this.scheduleToken;
    const execute = () => {
      if (token !== this.scheduleToken || !this.running) {
        return;
      }
      this.cancelScheduled = null;
      this.runTurn();
    };

    if (this.strategy === "microtask") {
      queueMicrotask(execute);
      this.cancelScheduled = () => {
        this.scheduleToken++;
      };
    } else if (this.strategy === "rAF" && this.raf) {
      const handle = this.raf(() => execute());
      const cancelRaf = this.cancelRaf;
      this.cancelScheduled = () => {
        this.scheduleToken++;
        cancelRaf?.(handle);
      };
    } else {
      const handle = setTimeout(execute, this.timeoutMs);
      this.cancelScheduled = () => {
        this.scheduleToken++;
        clearTimeout(handle);
      };
    }
  }

  private clearScheduled(): void {
    if (!this.cancelScheduled) return;
    this.cancelScheduled();
    this.cancelScheduled = null;
  }
}
