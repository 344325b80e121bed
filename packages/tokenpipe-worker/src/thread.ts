import path from "node:path";
import { pathToFileURL } from "node:url";
import { Worker, type WorkerOptions } from "node:worker_threads";
import type { PollerThreadBootstrap } from "./protocol";

export interface CreatePollerThreadOptions extends Omit<WorkerOptions, "workerData" | "eval"> {
  /**
   * Override the module executed inside the thread.
   *
   * Defaults to the poller bootstrap shipped next to this module.
   */
  entry?: string | URL;
}

/**
 * Returns the file URL of the poller thread bootstrap shipped with `@tokenpipe/worker`.
 */
export function getPollerThreadEntryUrl(): URL {
  const moduleUrl = getModuleUrl();
  // A fresh thread cannot load TypeScript, so from sources the thread starts
  // in a loader that registers tsx before importing the entry.
  if (moduleUrl.endsWith(".ts")) {
    return new URL("./poller-thread-loader.mjs", moduleUrl);
  }
  return siblingModuleUrl("poller-thread-entry");
}

/**
 * Returns the file URL of the NDJSON-over-HTTP decoder module, for use as
 * `decoderModule` in `beginThreadedStream`.
 */
export function getNdjsonHttpDecoderUrl(): URL {
  return siblingModuleUrl("ndjson-http-decoder");
}

/**
 * Creates a Node `worker_threads` Worker that runs one poller.
 */
export function createPollerThread(bootstrap: PollerThreadBootstrap, options: CreatePollerThreadOptions = {}): Worker {
  const { entry, ...workerOptions } = options;
  const entryUrl = normalizeModuleUrl(entry) ?? getPollerThreadEntryUrl();
  return new Worker(entryUrl, {
    ...workerOptions,
    workerData: bootstrap,
  });
}

/**
 * URLs pass through, relative and absolute paths become file URLs, anything
 * else is kept as a bare specifier for `import()`.
 */
export function resolveDecoderModule(value: string | URL): string {
  if (value instanceof URL) return value.href;
  if (value.startsWith(".") || path.isAbsolute(value)) {
    return pathToFileURL(path.resolve(value)).href;
  }
  try {
    return new URL(value).href;
  } catch {
    return value;
  }
}

function normalizeModuleUrl(value: string | URL | undefined): URL | undefined {
  if (!value) return undefined;
  if (value instanceof URL) return value;
  try {
    return new URL(value);
  } catch {
    return pathToFileURL(path.resolve(value));
  }
}

function siblingModuleUrl(name: string): URL {
  const moduleUrl = getModuleUrl();
  return new URL(`./${name}${moduleExtension(moduleUrl)}`, moduleUrl);
}

// Sources run through a TypeScript loader; the published build ships .mjs and .cjs.
function moduleExtension(moduleUrl: string): string {
  if (moduleUrl.endsWith(".ts")) return ".ts";
  if (moduleUrl.endsWith(".cjs")) return ".cjs";
  return ".mjs";
}

function getModuleUrl(): string {
  if (typeof __filename === "string" && __filename.length > 0) {
    return pathToFileURL(__filename).href;
  }
  return import.meta.url;
}
