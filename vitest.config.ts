import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["reportctl/test/**/*.test.ts"],
    environment: "node",
  },
});
