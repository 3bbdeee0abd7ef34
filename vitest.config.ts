import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["packages/*/__tests__/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 10000,
  },
})
