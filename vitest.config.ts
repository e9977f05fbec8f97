import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    isolate: true,
    restoreMocks: true,
    clearMocks: true,
    include: ["src/**/*.{test,spec}.ts"],
  },
});
