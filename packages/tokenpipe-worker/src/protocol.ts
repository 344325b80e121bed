import type { PollerIn, PollerOut, StreamTermination, Thresholds } from "@tokenpipe/core";

/** Everything a poller thread needs; must survive structured cloning. */
export interface PollerThreadBootstrap {
  streamId: string;
  /** Module URL or bare specifier exporting the decoder factory. */
  decoderModule: string;
  decoderExport: string;
  transport: unknown;
  thresholds: Thresholds;
  capacity: number;
  stallTimeoutMs?: number;
  cancelBuffer: SharedArrayBuffer;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isThreadBootstrap(value: unknown): value is PollerThreadBootstrap {
  if (!isRecord(value)) return false;
  return (
    typeof value.streamId === "string" &&
    typeof value.decoderModule === "string" &&
    typeof value.decoderExport === "string" &&
    typeof value.capacity === "number" &&
    isRecord(value.thresholds) &&
    value.cancelBuffer instanceof SharedArrayBuffer
  );
}

export function isPollerIn(value: unknown): value is PollerIn {
  if (!isRecord(value)) return false;
  switch (value.type) {
    case "ACK":
      return typeof value.count === "number";
    case "CANCEL":
    case "DISPOSE":
      return true;
    default:
      return false;
  }
}

function isTermination(value: unknown): value is StreamTermination {
  return isRecord(value) && typeof value.reason === "string" && typeof value.eventsDecoded === "number";
}

export function isPollerOut<T>(value: unknown): value is PollerOut<T> {
  if (!isRecord(value)) return false;
  switch (value.type) {
    case "READY":
      return true;
    case "BATCH":
      return isRecord(value.batch) && Array.isArray(value.batch.outcomes);
    case "CLOSED":
      return isTermination(value.termination);
    case "ERROR":
      return isRecord(value.error) && typeof value.error.message === "string";
    default:
      return false;
  }
}
