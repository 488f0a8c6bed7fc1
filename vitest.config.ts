import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      // Tests run against the engine sources, no build needed
      "@pytrim/engine": fileURLToPath(new URL("./packages/engine/src/index.ts", import.meta.url)),
    },
  },
  test: {
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    // The WASM grammar load dominates the first parser test
    testTimeout: 20_000,
    hookTimeout: 20_000,
  },
});
