import type { MessagePort, Worker } from "node:worker_threads";
import {
  type Batch,
  type BatchReceiver,
  type BatchSender,
  type CapacityGate,
  type GateResult,
  type PollerIn,
  type PollerOut,
  type StreamTermination,
  debugLog,
  errorOutcome,
  fromErrorPayload,
  toErrorPayload,
} from "@tokenpipe/core";
import { isPollerOut } from "./protocol";

/**
 * Thread side of the delivery channel. Each posted batch holds one unit of
 * capacity until the host acknowledges draining it.
 */
export class PortBatchSender<T> implements BatchSender<T> {
  private readonly port: MessagePort;
  private readonly gate: CapacityGate;
  private isClosed = false;

  constructor(port: MessagePort, gate: CapacityGate) {
    this.port = port;
    this.gate = gate;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async send(batch: Batch<T>): Promise<GateResult> {
    if (this.isClosed) {
      throw new Error("[tokenpipe:thread] send after close");
    }
    const result = await this.gate.acquire();
    this.gate.reserve();
    const message: PollerOut<T> = { type: "BATCH", batch };
    this.port.postMessage(message);
    return result;
  }

  close(): void {
    this.isClosed = true;
  }

  handle(message: PollerIn): void {
    switch (message.type) {
      case "ACK":
        this.gate.release(message.count);
        return;
      case "CANCEL":
        // The shared flag is already set; wake a parked send so it re-reads it.
        this.gate.wake();
        return;
      case "DISPOSE":
        this.gate.close();
        return;
    }
  }
}

/**
 * Host side of the delivery channel. Batches are buffered as they arrive and
 * acknowledged to the thread when drained.
 */
export class PortBatchReceiver<T> implements BatchReceiver<T> {
  readonly termination: Promise<StreamTermination>;
  private readonly worker: Worker;
  private readonly streamId: string;
  private queue: Batch<T>[] = [];
  private listeners = new Set<() => void>();
  private senderClosed = false;
  private receiverClosed = false;
  private exited = false;
  private lastSeq = 0;
  private terminalSeen = false;
  private reported: StreamTermination | null = null;
  private crash: unknown = null;

  constructor(worker: Worker, streamId: string) {
    this.worker = worker;
    this.streamId = streamId;
    this.worker.on("message", (message: unknown) => this.handleMessage(message));
    this.worker.on("error", (error: unknown) => {
      console.error(`[tokenpipe:thread] poller thread for stream ${this.streamId} threw:`, error);
      this.crash = error;
    });
    this.termination = new Promise((resolve) => {
      this.worker.once("exit", (code: number) => {
        this.exited = true;
        resolve(this.finish(code));
      });
    });
  }

  get closed(): boolean {
    return this.receiverClosed || (this.senderClosed && this.queue.length === 0);
  }

  get size(): number {
    return this.queue.length;
  }

  drain(): Batch<T>[] {
    if (this.queue.length === 0) {
      return [];
    }
    const batches = this.queue.splice(0, this.queue.length);
    if (!this.exited && !this.senderClosed) {
      this.post({ type: "ACK", count: batches.length });
    }
    return batches;
  }

  onReadable(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  close(): void {
    if (this.receiverClosed) return;
    this.receiverClosed = true;
    this.queue = [];
    this.listeners.clear();
    if (!this.exited) {
      this.post({ type: "DISPOSE" });
    }
  }

  /** Forwards a cancellation nudge so a thread parked on capacity wakes up. */
  nudgeCancel(): void {
    if (!this.exited) {
      this.post({ type: "CANCEL" });
    }
  }

  private post(message: PollerIn): void {
    this.worker.postMessage(message);
  }

  private handleMessage(message: unknown): void {
    if (!isPollerOut<T>(message)) {
      console.warn("[tokenpipe:thread] unknown message from poller thread:", message);
      return;
    }
    switch (message.type) {
      case "READY":
        debugLog("thread", "poller thread ready", { streamId: this.streamId });
        return;
      case "BATCH":
        this.lastSeq = message.batch.seq;
        if (message.batch.reason === "terminal") {
          this.terminalSeen = true;
        }
        if (this.receiverClosed) return;
        this.queue.push(message.batch);
        this.notify();
        return;
      case "CLOSED":
        this.reported = message.termination;
        this.senderClosed = true;
        this.notify();
        return;
      case "ERROR":
        console.error(`[tokenpipe:thread] poller thread for stream ${this.streamId} failed:`, message.error.message);
        this.crash = fromErrorPayload(message.error);
        return;
    }
  }

  private finish(code: number): StreamTermination {
    if (this.reported) {
      return this.reported;
    }
    // The thread went away without reporting: deliver the failure as the final batch.
    const failure = this.crash === null ? new Error(`poller thread exited with code ${code}`) : this.crash;
    if (!this.terminalSeen && !this.receiverClosed) {
      const outcome = errorOutcome<T>(failure);
      this.queue.push({ seq: this.lastSeq + 1, outcomes: [outcome], flushedAt: Date.now(), reason: "terminal" });
    }
    this.senderClosed = true;
    this.notify();
    return { reason: "crashed", eventsDecoded: 0, batchesSent: this.lastSeq, error: toErrorPayload(failure) };
  }

  private notify(): void {
    for (const listener of [...this.listeners]) {
      try {
        listener();
      } catch (error) {
        console.error("[tokenpipe:thread] readable listener threw:", error);
      }
    }
  }
}
