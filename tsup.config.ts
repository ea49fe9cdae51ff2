import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // platform: "neutral" — decoding needs only DataView, Uint8Array and
  // TextDecoder, which are identical in Node.js and browsers.
  platform: "neutral",
});
