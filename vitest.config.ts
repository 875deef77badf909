import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

export default defineConfig({
  root: fileURLToPath(new URL("./", import.meta.url)),
  test: {
    pool: "forks",
    testTimeout: 10000,
    globals: true,
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    exclude: ["node_modules", "dist"],
  },
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
});
