import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@taskminder/shared/logging": fileURLToPath(new URL("./shared/logging/index.ts", import.meta.url)),
    },
  },
  test: {
    include: ["shared/**/*.test.ts", "cli/src/**/*.test.ts"],
    setupFiles: ["./cli/src/test-setup.ts"],
    environment: "node",
  },
});
