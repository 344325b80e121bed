export { ConsumerLoop } from "./consumer-loop";
export type { ConsumerBatchStrategy, ConsumerLoopOptions, ConsumerTurnResult } from "./consumer-loop";
export { StreamStore } from "./stream-store";
export type { StreamReducer, StreamStoreSnapshot } from "./stream-store";
export { useStreamConsumer, useStreamStore } from "./hooks";
export type { ConsumableStream, UseStreamConsumerOptions } from "./hooks";
