import { defineConfig } from "vitest/config";

export default defineConfig({
  // Workspace packages load from src; Node alone gets dist through "import".
  resolve: { conditions: ["source"] },
  ssr: { resolve: { conditions: ["source"] } },
  test: {
    include: ["tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts", "src/main.ts"],
    },
  },
});
