import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // CLI + SDK code only, no DOM
    environment: "node",

    include: ["src/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],

    // Executor tests use short real delays
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
