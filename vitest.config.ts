import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["scripts/**/*.test.ts"],
    environment: "node",
    // quiet the pipeline's progress logging
    silent: true,
  },
});
