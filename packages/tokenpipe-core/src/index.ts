export type {
  Batch,
  DecoderContext,
  DecoderFactory,
  FlushReason,
  NowFn,
  PollerIn,
  PollerOut,
  RecordDecoder,
  StreamErrorKind,
  StreamErrorPayload,
  StreamEvent,
  StreamOutcome,
  StreamStats,
  StreamStatus,
  StreamTermination,
  TerminationReason,
  Thresholds,
  TimerApi,
} from "./types";
export {
  ChannelClosedError,
  DecodeError,
  ResourceExhaustedError,
  StreamStalledError,
  TokenpipeError,
  TransportError,
  errorOutcome,
  fromErrorPayload,
  toErrorPayload,
} from "./errors";
export type { TokenpipeErrorKind } from "./errors";
export { CancellationToken, linkAbortSignal } from "./cancellation";
export {
  Batcher,
  DEFAULT_MAX_BATCH_DELAY_MS,
  DEFAULT_MAX_BATCH_SIZE,
  isTerminalOutcome,
  normalizeThresholds,
} from "./batcher";
export type { BatchSink, BatcherOptions } from "./batcher";
export { CapacityGate, DEFAULT_CHANNEL_CAPACITY, createBatchChannel, normalizeCapacity } from "./channel";
export type { BatchChannelOptions, BatchReceiver, BatchSender, CapacityGateOptions, GateResult } from "./channel";
export { runPoller } from "./poller";
export type { PollerOptions } from "./poller";
export { StreamHandle } from "./stream-handle";
export type { BatchSource, StreamHandleParams } from "./stream-handle";
export { DEFAULT_MAX_CONCURRENT_STREAMS, StreamPool, defaultStreamPool } from "./pool";
export { beginStream, createStreamId } from "./begin-stream";
export type { BeginStreamOptions, CancellationPolicy, ChannelPolicy } from "./begin-stream";
export { DEFAULT_TIMERS, getDefaultNow, yieldToHost } from "./timers";
export { debugLog, isDebugEnabled } from "./debug";
export type { DebugFlag } from "./debug";
export { dataOutcome, decoderFromIterable } from "./decoders/iterable";
export { createNdjsonDecoder } from "./decoders/ndjson";
export type { NdjsonDecoderOptions } from "./decoders/ndjson";
export { openHttpTransport } from "./transport/http";
export type { HttpTransportDescriptor, HttpTransportOptions } from "./transport/http";
