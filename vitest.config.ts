import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["domain/**/*.test.ts", "config/**/*.test.ts"],
    globals: false,
  },
});
