import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts", "config/**/*.test.ts", "stages/**/*.test.ts"],
    environment: "node",
  },
});
