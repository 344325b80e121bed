import type { RecordDecoder, StreamOutcome } from "../types";

/** Adapts an async iterable of outcomes (e.g. an async generator) to the decoder contract. */
export function decoderFromIterable<T>(source: AsyncIterable<StreamOutcome<T>>): RecordDecoder<T> {
  const iterator = source[Symbol.asyncIterator]();
  let finished = false;

  return {
    async next() {
      if (finished) return undefined;
      const result = await iterator.next();
      if (result.done) {
        finished = true;
        return undefined;
      }
      return result.value;
    },
    async close() {
      if (finished) return;
      finished = true;
      await iterator.return?.();
    },
  };
}

export function dataOutcome<T>(payload: T, done = false): StreamOutcome<T> {
  return { ok: true, event: { payload, done } };
}
