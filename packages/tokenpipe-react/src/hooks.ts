import type { BatchSource } from "@tokenpipe/core";
import { useEffect, useMemo, useRef, useSyncExternalStore } from "react";
import { ConsumerLoop, type ConsumerLoopOptions, type ConsumerTurnResult } from "./consumer-loop";
import { type StreamReducer, StreamStore, type StreamStoreSnapshot } from "./stream-store";

export function useStreamStore<T, S>(store: StreamStore<T, S>): StreamStoreSnapshot<S> {
  return useSyncExternalStore(store.subscribe, store.getSnapshot, store.getSnapshot);
}

/** A stream the hook may dispose on unmount; `StreamHandle` qualifies. */
export interface ConsumableStream<T> extends BatchSource<T> {
  dispose?(): void;
}

export interface UseStreamConsumerOptions extends ConsumerLoopOptions {
  onTurn?: (result: ConsumerTurnResult) => void;
  /** Dispose the handle when the component unmounts or the handle changes. Defaults to true. */
  disposeOnUnmount?: boolean;
}

interface PendingDispose {
  handle: object;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Consumes `handle` for as long as the component is mounted and returns the
 * reduced state. A new store is created per handle. Options are read when the
 * loop starts, so inline callbacks and re-renders never restart or cancel it.
 *
 * The handle is disposed on unmount or when it is replaced. Disposal waits one
 * macrotask so that StrictMode's unmount and remount keeps the stream alive.
 */
export function useStreamConsumer<T, S>(
  handle: ConsumableStream<T> | null,
  reducer: StreamReducer<T, S>,
  initialState: S,
  options: UseStreamConsumerOptions = {},
): StreamStoreSnapshot<S> {
  const reducerRef = useRef(reducer);
  reducerRef.current = reducer;
  const optionsRef = useRef(options);
  optionsRef.current = options;
  const initialRef = useRef(initialState);
  const pendingDisposeRef = useRef<PendingDispose | null>(null);

  const store = useMemo(() => new StreamStore<T, S>((state, event) => reducerRef.current(state, event), initialRef.current), [handle]);

  useEffect(() => {
    if (!handle) return;
    const pending = pendingDisposeRef.current;
    if (pending && pending.handle === handle) {
      clearTimeout(pending.timer);
      pendingDisposeRef.current = null;
    }

    const { batch, raf, cancelRaf, timeoutMs, now } = optionsRef.current;
    const loop = new ConsumerLoop<T>({
      source: handle,
      onBatch: (next) => store.applyBatch(next),
      onTurn: (result) => optionsRef.current.onTurn?.(result),
      options: { batch, raf, cancelRaf, timeoutMs, now },
    });
    loop.start();
    return () => {
      loop.stop();
      if (optionsRef.current.disposeOnUnmount === false) return;
      const timer = setTimeout(() => {
        if (pendingDisposeRef.current?.handle === handle) {
          pendingDisposeRef.current = null;
        }
        handle.dispose?.();
      }, 0);
      pendingDisposeRef.current = { handle, timer };
    };
  }, [handle, store]);

  return useStreamStore(store);
}
