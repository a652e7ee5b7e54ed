import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    name: "flow",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
})
