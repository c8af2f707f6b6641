import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "vectormath",
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
