/**
 * Vitest configuration for @conductor/server
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    setupFiles: ["./tests/vitest.setup.ts"],
    include: ["src/**/__tests__/**/*.test.ts", "db/__tests__/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: ["node_modules/", "dist/", "**/*.test.ts", "**/types/"],
    },
    exclude: ["node_modules", "dist"],
  },
});
