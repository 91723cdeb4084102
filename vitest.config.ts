import path from "node:path"
import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

const rootDir = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      "app-config": path.resolve(rootDir, "config.ts"),
      src: path.resolve(rootDir, "src"),
    },
  },
  test: {
    environment: "node",
    include: ["config.test.ts", "src/**/*.test.ts"],
  },
})
