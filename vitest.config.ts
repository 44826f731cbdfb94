import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const isCI = process.env.CI === "1" || process.env.CI === "true";

const fromRoot = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "gis-shapes-engine": fromRoot("./engine/src/index.ts"),
      "gis-shapes-geodesy": fromRoot("./geodesy/src/index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["engine/tests/**/*.test.ts", "geodesy/tests/**/*.test.ts"],
    pool: isCI ? "forks" : "threads",
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    watch: false,
    testTimeout: isCI ? 30000 : 10000,
  },
});
