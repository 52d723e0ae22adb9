import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["cloudimgctl/test/**/*.test.ts"],
    environment: "node",
  },
});
