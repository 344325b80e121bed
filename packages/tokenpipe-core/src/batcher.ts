import { DEFAULT_TIMERS, getDefaultNow } from "./timers";
import type { Batch, FlushReason, NowFn, StreamOutcome, Thresholds, TimerApi } from "./types";

export const DEFAULT_MAX_BATCH_SIZE = 100;
export const DEFAULT_MAX_BATCH_DELAY_MS = 4;

export function normalizeThresholds(input: Partial<Thresholds> = {}): Thresholds {
  const size = Number(input.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE);
  const delay = Number(input.maxBatchDelayMs ?? DEFAULT_MAX_BATCH_DELAY_MS);
  return {
    maxBatchSize: Number.isFinite(size) ? Math.max(1, Math.floor(size)) : DEFAULT_MAX_BATCH_SIZE,
    maxBatchDelayMs: Number.isFinite(delay) ? Math.max(0, delay) : DEFAULT_MAX_BATCH_DELAY_MS,
  };
}

export function isTerminalOutcome<T>(outcome: StreamOutcome<T>): boolean {
  return !outcome.ok || outcome.event.done;
}

export type BatchSink<T> = (batch: Batch<T>) => Promise<unknown>;

export interface BatcherOptions<T> {
  sink: BatchSink<T>;
  thresholds?: Partial<Thresholds>;
  now?: NowFn;
  timers?: TimerApi;
}

/**
 * Groups outcomes into batches bounded by size and age.
 *
 * The first outcome of the stream goes out alone. A terminal outcome flushes
 * whatever is pending and then goes out alone. Age is checked on every push
 * as well as by the delay timer, so a producer that never yields still gets
 * batches no older than the delay. Batches reach the sink one at
 * a time in order; every `push` resolves only after the sink accepted all
 * batches formed so far, so a blocked sink blocks the producer.
 */
export class Batcher<T> {
  readonly thresholds: Thresholds;
  private readonly sink: BatchSink<T>;
  private readonly now: NowFn;
  private readonly timers: TimerApi;
  private pending: StreamOutcome<T>[] = [];
  private cancelTimer: (() => void) | null = null;
  private firstPendingAt = 0;
  private seq = 0;
  private started = false;
  private closed = false;
  private tail: Promise<void> = Promise.resolve();
  private failure: { error: unknown } | null = null;

  constructor(options: BatcherOptions<T>) {
    this.sink = options.sink;
    this.thresholds = normalizeThresholds(options.thresholds);
    this.now = options.now ?? getDefaultNow();
    this.timers = options.timers ?? DEFAULT_TIMERS;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  get emittedCount(): number {
    return this.seq;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(outcome: StreamOutcome<T>): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error("[tokenpipe] push after batcher closed"));
    }

    if (isTerminalOutcome(outcome)) {
      this.flushPending("terminal");
      this.emit([outcome], "terminal");
      this.closed = true;
      this.started = true;
      return this.settled();
    }

    if (!this.started) {
      this.started = true;
      this.emit([outcome], "first");
      return this.settled();
    }

    this.pending.push(outcome);
    if (this.pending.length === 1) {
      this.firstPendingAt = this.now();
    }
    if (this.pending.length >= this.thresholds.maxBatchSize) {
      this.flushPending("size");
    } else if (this.isOverdue()) {
      // The timer cannot fire while the producer keeps the event loop busy.
      this.flushPending("delay");
    } else if (this.pending.length === 1) {
      this.armTimer();
    }
    return this.settled();
  }

  /** Flushes the partial batch now, without closing. */
  flush(): Promise<void> {
    this.flushPending("drain");
    return this.settled();
  }

  /** Flushes the partial batch and refuses further pushes. */
  close(): Promise<void> {
    if (!this.closed) {
      this.flushPending("drain");
      this.closed = true;
    }
    return this.settled();
  }

  /** Drops the partial batch and the delay timer. Batches already formed still reach the sink. */
  dispose(): void {
    this.disarmTimer();
    this.pending = [];
    this.closed = true;
  }

  private flushPending(reason: FlushReason): void {
    this.disarmTimer();
    if (this.pending.length === 0) {
      return;
    }
    const outcomes = this.pending;
    this.pending = [];
    this.emit(outcomes, reason);
  }

  private emit(outcomes: StreamOutcome<T>[], reason: FlushReason): void {
    const batch: Batch<T> = {
      seq: ++this.seq,
      outcomes,
      flushedAt: this.now(),
      reason,
    };
    this.tail = this.tail
      .then(async () => {
        if (this.failure) return;
        await this.sink(batch);
      })
      .catch((error: unknown) => {
        this.failure ??= { error };
      });
  }

  private settled(): Promise<void> {
    return this.tail.then(() => {
      if (this.failure) {
        throw this.failure.error;
      }
    });
  }

  private isOverdue(): boolean {
    const delay = this.thresholds.maxBatchDelayMs;
    return delay > 0 && this.pending.length > 0 && this.now() - this.firstPendingAt >= delay;
  }

  private armTimer(): void {
    // A zero delay means size-only batching.
    if (this.thresholds.maxBatchDelayMs <= 0) {
      return;
    }
    this.disarmTimer();
    this.cancelTimer = this.timers.setTimer(() => {
      this.cancelTimer = null;
      this.flushPending("delay");
    }, this.thresholds.maxBatchDelayMs);
  }

  private disarmTimer(): void {
    if (this.cancelTimer) {
      this.cancelTimer();
      this.cancelTimer = null;
    }
  }
}
