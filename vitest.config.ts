import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    exclude: ["node_modules/**", "dist/**"],
  },
});
