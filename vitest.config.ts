import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["translit/**/*_test.ts"],
  },
});
