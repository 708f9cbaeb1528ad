import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    // DOM tests opt in with a `@vitest-environment jsdom` comment
    environment: "node",
    include: ["packages/*/src/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 30000,
    clearMocks: true,
    restoreMocks: true,
  },
});
