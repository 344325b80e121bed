export type DebugFlag = "poller" | "thread" | "consumer";

// Debug toggles (controlled via env or global flag to avoid noisy consoles)
export function isDebugEnabled(flag: DebugFlag): boolean {
  try {
    if (typeof process !== "undefined" && process.env) {
      const raw = process.env.TOKENPIPE_DEBUG;
      if (raw) {
        const flags = raw.split(",").map((value) => value.trim().toLowerCase());
        if (flags.includes("1") || flags.includes("all") || flags.includes(flag)) return true;
      }
    }
  } catch {
    // ignore env read errors
  }
  try {
    const flags: unknown = Reflect.get(globalThis, "__TOKENPIPE_DEBUG__");
    if (typeof flags === "object" && flags !== null && Reflect.get(flags, flag) === true) return true;
  } catch {
    // ignore global read errors
  }
  return false;
}

export function debugLog(flag: DebugFlag, message: string, details?: Record<string, unknown>): void {
  if (!isDebugEnabled(flag)) return;
  if (details) {
    console.debug(`[tokenpipe:${flag}] ${message}`, details);
  } else {
    console.debug(`[tokenpipe:${flag}] ${message}`);
  }
}
