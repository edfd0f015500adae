import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    globals: true, // Use global APIs like `describe`, `it`, `expect`
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
  },
});
