import type { NowFn, TimerApi } from "./types";

export const DEFAULT_TIMERS: TimerApi = {
  setTimer: (callback, ms) => {
    const handle = setTimeout(callback, ms);
    return () => clearTimeout(handle);
  },
};

export function getDefaultNow(): NowFn {
  if (typeof performance !== "undefined" && typeof performance.now === "function") {
    return () => performance.now();
  }
  return () => Date.now();
}

/** Resolves on the next macrotask turn, letting timers and I/O callbacks run. */
export function yieldToHost(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
