import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.ffmpeg.test.ts"],
    environment: "node",
    testTimeout: 120000,
  },
});
