import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@mention-pulse/collector": fileURLToPath(new URL("./collector/src/index.ts", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    include: ["collector/tests/**/*.test.ts", "orchestrator/tests/**/*.test.ts"],
    setupFiles: ["./tests/setup-env.ts"],
  },
});
