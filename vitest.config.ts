import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts", "processes/**/*.test.ts"],
    env: { NO_COLOR: "1" },
  },
});
