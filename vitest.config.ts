import { defineConfig } from "vitest/config"
import { fileURLToPath } from "node:url"

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url))

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@core$/, replacement: fromRoot("./src/core/index.ts") },
      { find: /^@cli\/(.*)$/, replacement: fromRoot("./src/cli/$1") },
      { find: /^@domain\/(.*)$/, replacement: fromRoot("./src/core/domain/$1") },
      { find: /^@services\/(.*)$/, replacement: fromRoot("./src/core/services/$1") },
      { find: /^@test\/(.*)$/, replacement: fromRoot("./src/test/$1") },
    ],
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    testTimeout: 10000,
  },
})
