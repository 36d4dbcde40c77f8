import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    globals: false,
    // one MuPDF WASM instance per test file
    pool: "forks",
  },
  resolve: {
    alias: {
      "@": path.resolve(rootDir, "."),
    },
  },
});
