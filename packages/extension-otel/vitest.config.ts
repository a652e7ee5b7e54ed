import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    name: "extension-otel",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
})
