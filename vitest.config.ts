import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // PGlite boots a wasm Postgres per test file.
    testTimeout: 30_000,
    hookTimeout: 60_000,
  },
});
