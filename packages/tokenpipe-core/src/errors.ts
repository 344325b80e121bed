import type { StreamErrorKind, StreamErrorPayload, StreamOutcome } from "./types";

export type TokenpipeErrorKind = StreamErrorKind | "channel-closed" | "resource-exhausted";

export class TokenpipeError extends Error {
  readonly kind: TokenpipeErrorKind;

  constructor(kind: TokenpipeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TokenpipeError";
    this.kind = kind;
  }
}

/** Connection or read failure. Terminal. */
export class TransportError extends TokenpipeError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super("transport", message, { cause: options.cause });
    this.name = "TransportError";
    this.status = options.status;
  }
}

/** Malformed record. Terminal unless the decoder skips it. */
export class DecodeError extends TokenpipeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("decode", message, options);
    this.name = "DecodeError";
  }
}

/** The consuming end of the delivery channel is gone. */
export class ChannelClosedError extends TokenpipeError {
  constructor(message = "delivery channel closed by consumer") {
    super("channel-closed", message);
    this.name = "ChannelClosedError";
  }
}

/** No execution context could be created for the poller. */
export class ResourceExhaustedError extends TokenpipeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("resource-exhausted", message, options);
    this.name = "ResourceExhaustedError";
  }
}

export class StreamStalledError extends TokenpipeError {
  constructor(stallTimeoutMs: number) {
    super("stalled", `consumer did not drain the delivery channel within ${stallTimeoutMs}ms`);
    this.name = "StreamStalledError";
  }
}

function isPayloadKind(kind: TokenpipeErrorKind): kind is StreamErrorKind {
  return kind === "transport" || kind === "decode" || kind === "stalled" || kind === "internal";
}

/**
 * Flattens any thrown value into a payload that survives structured cloning.
 * `fallbackKind` applies to values that are not TokenpipeErrors.
 */
export function toErrorPayload(error: unknown, fallbackKind: StreamErrorKind = "internal"): StreamErrorPayload {
  if (error instanceof TokenpipeError) {
    const payload: StreamErrorPayload = {
      kind: isPayloadKind(error.kind) ? error.kind : fallbackKind,
      message: error.message,
      name: error.name,
      stack: error.stack,
    };
    if (error instanceof TransportError && error.status !== undefined) {
      payload.status = error.status;
    }
    return payload;
  }
  if (error instanceof Error) {
    return { kind: fallbackKind, message: error.message, name: error.name, stack: error.stack };
  }
  return { kind: fallbackKind, message: String(error) };
}

export function fromErrorPayload(payload: StreamErrorPayload): TokenpipeError {
  let error: TokenpipeError;
  switch (payload.kind) {
    case "transport":
      error = new TransportError(payload.message, { status: payload.status });
      break;
    case "decode":
      error = new DecodeError(payload.message);
      break;
    default:
      error = new TokenpipeError(payload.kind, payload.message);
  }
  if (payload.stack) {
    error.stack = payload.stack;
  }
  return error;
}

export function errorOutcome<T>(error: unknown, fallbackKind: StreamErrorKind = "internal"): StreamOutcome<T> {
  return { ok: false, error: toErrorPayload(error, fallbackKind) };
}
