import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    root: "./",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    environment: "node",
    setupFiles: ["src/testing/setup.ts"],
  },
});
