import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // FileStore reaches node:fs, so the bundle targets Node.js rather than
  // staying platform-neutral. apache-arrow and zod stay external.
  platform: "node",
  target:   "node20",
});
