import type { CancellationToken } from "./cancellation";
import { ChannelClosedError } from "./errors";
import { DEFAULT_TIMERS, getDefaultNow } from "./timers";
import type { Batch, NowFn, TimerApi } from "./types";

export const DEFAULT_CHANNEL_CAPACITY = Number.POSITIVE_INFINITY;

/**
 * - `ready`: capacity was available.
 * - `cancelled`: the stream is being cancelled; capacity is bypassed so the final flush is not lost.
 * - `stalled`: the consumer did not drain within the stall timeout; capacity is bypassed from here on.
 */
export type GateResult = "ready" | "cancelled" | "stalled";

export interface CapacityGateOptions {
  capacity?: number;
  token?: CancellationToken;
  stallTimeoutMs?: number;
  timers?: TimerApi;
  /** Measures how long the sender has been parked; should match `timers`. */
  now?: NowFn;
}

export function normalizeCapacity(value: number | undefined): number {
  if (value === undefined || value === Number.POSITIVE_INFINITY) {
    return DEFAULT_CHANNEL_CAPACITY;
  }
  if (!Number.isFinite(value)) {
    return DEFAULT_CHANNEL_CAPACITY;
  }
  return Math.max(1, Math.floor(value));
}

/**
 * Counts batches handed to the consumer but not yet drained, and parks the
 * sender while that count sits at capacity.
 */
export class CapacityGate {
  readonly capacity: number;
  private readonly token?: CancellationToken;
  private readonly stallTimeoutMs?: number;
  private readonly timers: TimerApi;
  private readonly now: NowFn;
  private inFlight = 0;
  private closed = false;
  private stalled = false;
  private waiters = new Set<() => void>();

  constructor(options: CapacityGateOptions = {}) {
    this.capacity = normalizeCapacity(options.capacity);
    this.token = options.token;
    this.stallTimeoutMs =
      options.stallTimeoutMs !== undefined && Number.isFinite(options.stallTimeoutMs) ? Math.max(0, options.stallTimeoutMs) : undefined;
    this.timers = options.timers ?? DEFAULT_TIMERS;
    this.now = options.now ?? getDefaultNow();
  }

  get pending(): number {
    return this.inFlight;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async acquire(): Promise<GateResult> {
    let blockedSince: number | null = null;
    for (;;) {
      if (this.closed) {
        throw new ChannelClosedError();
      }
      if (this.token?.poll()) {
        return "cancelled";
      }
      if (this.stalled) {
        return "stalled";
      }
      if (this.inFlight < this.capacity) {
        return "ready";
      }
      blockedSince ??= this.now();
      const remaining = this.stallTimeoutMs === undefined ? undefined : this.stallTimeoutMs - (this.now() - blockedSince);
      if (remaining !== undefined && remaining <= 0) {
        this.stalled = true;
        return "stalled";
      }
      await this.waitForChange(remaining);
    }
  }

  reserve(): void {
    this.inFlight += 1;
  }

  release(count: number): void {
    if (count <= 0) return;
    this.inFlight = Math.max(0, this.inFlight - count);
    this.wake();
  }

  /** Called when the consumer is gone; pending and future acquires reject. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wake();
  }

  /** Wakes a parked sender so it re-checks the cancellation token. */
  wake(): void {
    if (this.waiters.size === 0) return;
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const resolve of waiters) {
      resolve();
    }
  }

  private waitForChange(timeoutMs: number | undefined): Promise<void> {
    return new Promise<void>((resolve) => {
      let cancelTimer: (() => void) | null = null;
      let unsubscribe: (() => void) | null = null;
      const done = () => {
        this.waiters.delete(done);
        cancelTimer?.();
        cancelTimer = null;
        unsubscribe?.();
        resolve();
      };
      this.waiters.add(done);
      if (this.token) {
        unsubscribe = this.token.onCancel(done);
      }
      if (timeoutMs !== undefined) {
        cancelTimer = this.timers.setTimer(() => {
          cancelTimer = null;
          this.stalled = true;
          done();
        }, timeoutMs);
      }
    });
  }
}

export interface BatchSender<T> {
  /** Resolves once the batch is queued; rejects with ChannelClosedError if the consumer is gone. */
  send(batch: Batch<T>): Promise<GateResult>;
  close(): void;
  readonly closed: boolean;
}

export interface BatchReceiver<T> {
  /** Removes and returns every queued batch. Never waits. */
  drain(): Batch<T>[];
  /** True once the sender closed and every batch was drained. */
  readonly closed: boolean;
  readonly size: number;
  onReadable(listener: () => void): () => void;
  /** Drops the consuming end; the sender observes ChannelClosedError. */
  close(): void;
}

export type BatchChannelOptions = CapacityGateOptions;

interface ChannelState<T> {
  queue: Batch<T>[];
  gate: CapacityGate;
  senderClosed: boolean;
  receiverClosed: boolean;
  listeners: Set<() => void>;
}

function notifyReadable<T>(state: ChannelState<T>): void {
  for (const listener of [...state.listeners]) {
    try {
      listener();
    } catch (error) {
      console.error("[tokenpipe] readable listener threw:", error);
    }
  }
}

class LocalBatchSender<T> implements BatchSender<T> {
  constructor(private readonly state: ChannelState<T>) {}

  get closed(): boolean {
    return this.state.senderClosed;
  }

  async send(batch: Batch<T>): Promise<GateResult> {
    if (this.state.senderClosed) {
      throw new Error("[tokenpipe] send after close");
    }
    const result = await this.state.gate.acquire();
    this.state.gate.reserve();
    this.state.queue.push(batch);
    notifyReadable(this.state);
    return result;
  }

  close(): void {
    if (this.state.senderClosed) return;
    this.state.senderClosed = true;
    notifyReadable(this.state);
  }
}

class LocalBatchReceiver<T> implements BatchReceiver<T> {
  constructor(private readonly state: ChannelState<T>) {}

  get closed(): boolean {
    return this.state.receiverClosed || (this.state.senderClosed && this.state.queue.length === 0);
  }

  get size(): number {
    return this.state.queue.length;
  }

  drain(): Batch<T>[] {
    if (this.state.queue.length === 0) {
      return [];
    }
    const batches = this.state.queue.splice(0, this.state.queue.length);
    this.state.gate.release(batches.length);
    return batches;
  }

  onReadable(listener: () => void): () => void {
    this.state.listeners.add(listener);
    return () => {
      this.state.listeners.delete(listener);
    };
  }

  close(): void {
    if (this.state.receiverClosed) return;
    this.state.receiverClosed = true;
    this.state.queue = [];
    this.state.listeners.clear();
    this.state.gate.close();
  }
}

/** Single-producer, single-consumer FIFO of batches within one thread. */
export function createBatchChannel<T>(options: BatchChannelOptions = {}): { sender: BatchSender<T>; receiver: BatchReceiver<T> } {
  const state: ChannelState<T> = {
    queue: [],
    gate: new CapacityGate(options),
    senderClosed: false,
    receiverClosed: false,
    listeners: new Set(),
  };
  return { sender: new LocalBatchSender(state), receiver: new LocalBatchReceiver(state) };
}
