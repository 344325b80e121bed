export { beginThreadedStream, DEFAULT_MAX_POLLER_THREADS, defaultPollerThreadPool } from "./threaded-stream";
export type { BeginThreadedStreamOptions } from "./threaded-stream";
export { createPollerThread, getNdjsonHttpDecoderUrl, getPollerThreadEntryUrl, resolveDecoderModule } from "./thread";
export type { CreatePollerThreadOptions } from "./thread";
export { PortBatchReceiver, PortBatchSender } from "./port-channel";
export { isPollerIn, isPollerOut, isThreadBootstrap } from "./protocol";
export type { PollerThreadBootstrap } from "./protocol";
export type { NdjsonHttpTransport } from "./ndjson-http-decoder";
