import path from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@nodecanvas/client-core": path.resolve(rootDir, "packages/client-core/src"),
      "@nodecanvas/client-react": path.resolve(rootDir, "packages/client-react/src/index.ts")
    }
  },
  test: {
    globals: true,
    environment: "happy-dom",
    include: ["packages/*/src/**/*.test.{ts,tsx}"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "coverage"
    }
  }
});
