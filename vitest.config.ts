import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["lib/**/*_test.ts"],
  },
});
