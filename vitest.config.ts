import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "components/**/*.test.ts"],
    environment: "node",
  },
});
