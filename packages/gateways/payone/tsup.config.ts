import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
  },
  format: ["esm", "cjs"],
  dts: {
    resolve: true,
  },
  external: ["@gatewire/core"],
  sourcemap: true,
  clean: true,
  target: "es2020",
});
