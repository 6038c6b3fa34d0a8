import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    name: "views",
    include: ["src/**/*.test.ts"],
    setupFiles: ["./src/test-setup.ts"],
  },
})
