import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  test: {
    include: ["packages/core/test/**/*.test.ts", "packages/gateways/*/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
  plugins: [tsconfigPaths({ projects: ["."] })],
});
