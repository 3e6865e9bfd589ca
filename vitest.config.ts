// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";
import path from "node:path";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/services/**/test/**/*.spec.ts"],
    reporters: ["default"],
    restoreMocks: true,
    watch: false,
    env: {
      LOG_LEVEL: "silent",
    },
  },
  resolve: {
    alias: {
      // e.g. import "@rt/shared/logger/Logger"
      "@rt/shared": path.resolve(__dirname, "backend/services/shared/src"),
    },
  },
});
