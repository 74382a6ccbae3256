import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // platform: "neutral" — @dynbytes/core touches only Uint8Array and DataView,
  // which behave identically in browsers and Node.js.
  platform: "neutral",
});
