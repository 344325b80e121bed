import { join } from "node:path";
import { defineConfig } from "tsup";

const resolve = (p: string) => join(__dirname, p);
const sourcemap = process.env.SOURCEMAP === "1" || process.env.SOURCEMAP === "true";

// The thread entry and the bundled decoder are loaded by URL next to the main
// bundle, so they must stay separate entries in the same directory.
export default defineConfig({
  entry: [resolve("src/index.ts"), resolve("src/poller-thread-entry.ts"), resolve("src/ndjson-http-decoder.ts")],
  dts: true,
  splitting: false,
  sourcemap,
  clean: true,
  format: ["esm", "cjs"],
  outDir: join(__dirname, "dist"),
  target: "node20",
  external: ["@tokenpipe/core"],
  outExtension({ format }) {
    return {
      js: format === "cjs" ? ".cjs" : ".mjs",
    };
  },
});
