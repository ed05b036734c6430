import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["gateway/**/*.test.ts", "shared/**/*.test.ts"],
    env: {
      LOG_LEVEL: "error",
    },
  },
});
