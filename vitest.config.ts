import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    // better-sqlite3 is a native addon; forks keep each file in its own process
    pool: "forks",
  },
})
