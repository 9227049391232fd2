import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["gatectl/test/**/*.test.ts"],
    environment: "node",
  },
});
