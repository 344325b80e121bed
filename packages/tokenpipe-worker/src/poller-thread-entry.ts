import { parentPort, workerData } from "node:worker_threads";
import {
  CancellationToken,
  CapacityGate,
  type PollerOut,
  type RecordDecoder,
  type StreamTermination,
  debugLog,
  runPoller,
  toErrorPayload,
} from "@tokenpipe/core";
import { PortBatchSender } from "./port-channel";
import { type PollerThreadBootstrap, isPollerIn, isThreadBootstrap } from "./protocol";

const port = parentPort;
if (!port) {
  throw new Error("[tokenpipe] poller thread bootstrap missing parentPort.");
}

const bootstrap: unknown = workerData;
if (!isThreadBootstrap(bootstrap)) {
  throw new Error("[tokenpipe] poller thread started without a valid bootstrap.");
}

function post(message: PollerOut): void {
  port?.postMessage(message);
}

function isRecordDecoder(value: unknown): value is RecordDecoder<unknown> {
  return typeof value === "object" && value !== null && typeof Reflect.get(value, "next") === "function";
}

async function loadDecoderFactory(specifier: string, exportName: string): Promise<(transport: unknown, context: { streamId: string }) => Promise<RecordDecoder<unknown>>> {
  const mod: unknown = await import(specifier);
  const factory = typeof mod === "object" && mod !== null ? Reflect.get(mod, exportName) : undefined;
  if (typeof factory !== "function") {
    throw new Error(`[tokenpipe] decoder module ${specifier} has no export named "${exportName}".`);
  }
  return async (transport, context) => {
    const decoder: unknown = await Reflect.apply(factory, undefined, [transport, context]);
    if (!isRecordDecoder(decoder)) {
      throw new Error(`[tokenpipe] "${exportName}" from ${specifier} did not return a record decoder.`);
    }
    return decoder;
  };
}

const token = CancellationToken.fromShared(bootstrap.cancelBuffer);
const gate = new CapacityGate({
  capacity: bootstrap.capacity,
  token,
  stallTimeoutMs: bootstrap.stallTimeoutMs,
});
const sender = new PortBatchSender<unknown>(port, gate);

const onMessage = (data: unknown) => {
  if (!isPollerIn(data)) {
    console.warn("[tokenpipe:thread] unknown message from host:", data);
    return;
  }
  sender.handle(data);
};
port.on("message", onMessage);

async function main(config: PollerThreadBootstrap): Promise<StreamTermination> {
  const createDecoder = await loadDecoderFactory(config.decoderModule, config.decoderExport);
  post({ type: "READY" });
  debugLog("thread", "decoder module loaded", { streamId: config.streamId, module: config.decoderModule });
  return runPoller<unknown>({
    streamId: config.streamId,
    openDecoder: () => createDecoder(config.transport, { streamId: config.streamId }),
    sender,
    token,
    thresholds: config.thresholds,
    stallTimeoutMs: config.stallTimeoutMs,
  });
}

main(bootstrap)
  .then((termination) => {
    post({ type: "CLOSED", termination });
  })
  .catch((error: unknown) => {
    console.error("[tokenpipe:thread] poller thread failed:", error);
    post({ type: "ERROR", error: toErrorPayload(error) });
  })
  .finally(() => {
    // Leaving the listener attached would keep the thread alive.
    port.off("message", onMessage);
  });
