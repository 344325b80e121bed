import type { Batch, StreamErrorPayload, StreamEvent } from "@tokenpipe/core";

export type StreamReducer<T, S> = (state: S, event: StreamEvent<T>) => S;

export interface StreamStoreSnapshot<S> {
  state: S;
  /** Set once a terminal error outcome was applied. */
  error: StreamErrorPayload | null;
  /** A `done` event or an error was applied. */
  done: boolean;
  outcomeCount: number;
  batchCount: number;
}

/**
 * Folds delivered outcomes into UI state. Snapshots are immutable and only
 * replaced when a batch is applied, which is what `useSyncExternalStore`
 * expects.
 */
export class StreamStore<T, S> {
  private readonly reducer: StreamReducer<T, S>;
  private readonly initialState: S;
  private snapshot: StreamStoreSnapshot<S>;
  private listeners = new Set<() => void>();

  constructor(reducer: StreamReducer<T, S>, initialState: S) {
    this.reducer = reducer;
    this.initialState = initialState;
    this.snapshot = StreamStore.emptySnapshot(initialState);
  }

  private static emptySnapshot<S>(state: S): StreamStoreSnapshot<S> {
    return Object.freeze({ state, error: null, done: false, outcomeCount: 0, batchCount: 0 });
  }

  readonly getSnapshot = (): StreamStoreSnapshot<S> => this.snapshot;

  readonly subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  applyBatch(batch: Batch<T>): void {
    let { state, error, done } = this.snapshot;
    let applied = 0;
    for (const outcome of batch.outcomes) {
      // Nothing follows a terminal outcome.
      if (done) break;
      applied += 1;
      if (outcome.ok) {
        state = this.reducer(state, outcome.event);
        done = outcome.event.done;
      } else {
        error = outcome.error;
        done = true;
      }
    }
    this.snapshot = Object.freeze({
      state,
      error,
      done,
      outcomeCount: this.snapshot.outcomeCount + applied,
      batchCount: this.snapshot.batchCount + 1,
    });
    this.emit();
  }

  reset(): void {
    this.snapshot = StreamStore.emptySnapshot(this.initialState);
    this.emit();
  }

  private emit(): void {
    for (const listener of [...this.listeners]) {
      try {
        listener();
      } catch (error) {
        console.error("[tokenpipe:consumer] store listener failed", error);
      }
    }
  }
}
