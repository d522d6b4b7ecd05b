import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.{test,spec}.ts"],
    setupFiles: ["./src/test/setup-matchers.ts"],
    isolate: true,
    restoreMocks: true,
    clearMocks: true,
  },
});
