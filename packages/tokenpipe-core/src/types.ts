/**
 * Core stream model
 */

/** One unit of generated content. `done` marks the end of the stream. */
export interface StreamEvent<T> {
  readonly payload: T;
  readonly done: boolean;
}

export type StreamErrorKind = "transport" | "decode" | "stalled" | "internal";

/** Serializable error shape; crosses the thread boundary and the delivery channel. */
export interface StreamErrorPayload {
  kind: StreamErrorKind;
  message: string;
  name?: string;
  stack?: string;
  status?: number;
}

export type StreamOutcome<T> = { readonly ok: true; readonly event: StreamEvent<T> } | { readonly ok: false; readonly error: StreamErrorPayload };

export type FlushReason = "first" | "size" | "delay" | "terminal" | "drain";

export interface Batch<T> {
  /** Position of the batch in delivery order, starting at 1. */
  seq: number;
  outcomes: StreamOutcome<T>[];
  flushedAt: number;
  reason: FlushReason;
}

export interface Thresholds {
  maxBatchSize: number;
  maxBatchDelayMs: number;
}

/**
 * Pull-based record decoder. Resolves `undefined` once the underlying
 * transport is exhausted. Rejections are treated as terminal transport errors.
 */
export interface RecordDecoder<T> {
  next(): Promise<StreamOutcome<T> | undefined>;
  /** Releases the transport. Called once after the poller stops. */
  close?(): void | Promise<void>;
}

export interface DecoderContext {
  streamId: string;
}

export type DecoderFactory<TTransport, T> = (transport: TTransport, context: DecoderContext) => RecordDecoder<T> | Promise<RecordDecoder<T>>;

export type StreamStatus = "active" | "cancelling" | "closed";

export type TerminationReason = "exhausted" | "terminal" | "cancelled" | "channel-closed" | "stalled" | "crashed";

export interface StreamTermination {
  reason: TerminationReason;
  eventsDecoded: number;
  batchesSent: number;
  error?: StreamErrorPayload;
}

export interface StreamStats {
  startedAt: number;
  firstBatchAt: number | null;
  timeToFirstBatchMs: number | null;
  batchesReceived: number;
  outcomesReceived: number;
  largestBatch: number;
  closedAt: number | null;
}

/** Schedules a one-shot callback; the returned function cancels it. */
export interface TimerApi {
  setTimer(callback: () => void, ms: number): () => void;
}

export type NowFn = () => number;

/**
 * Poller thread protocol
 */
export type PollerIn = { type: "ACK"; count: number } | { type: "CANCEL" } | { type: "DISPOSE" };

export type PollerOut<T = unknown> =
  | { type: "READY" }
  | { type: "BATCH"; batch: Batch<T> }
  | { type: "CLOSED"; termination: StreamTermination }
  | { type: "ERROR"; error: StreamErrorPayload };
