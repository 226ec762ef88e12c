import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/**/*_test.ts"],
    environment: "node",
  },
});
