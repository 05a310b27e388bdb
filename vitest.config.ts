import { defineConfig } from "vitest/config"
import { fileURLToPath } from "node:url"

const r = (p: string) => fileURLToPath(new URL(p, import.meta.url))

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "tessera-client": r("./packages/tessera-client/src/index.ts"),
      tessera: r("./packages/tessera/src/index.ts"),
    },
  },
})
