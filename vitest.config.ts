import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const sharedSrc = (path: string): string =>
  fileURLToPath(new URL(`./packages/shared/src/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@fis-bap/shared/crypto": sharedSrc("crypto/index.ts"),
      "@fis-bap/shared/protocol": sharedSrc("protocol/index.ts"),
      "@fis-bap/shared/middleware": sharedSrc("middleware/index.ts"),
      "@fis-bap/shared/utils": sharedSrc("utils/index.ts"),
      "@fis-bap/shared/db": sharedSrc("db/index.ts"),
      "@fis-bap/shared": sharedSrc("index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/**/src/**/*.test.ts", "scripts/src/**/*.test.ts", "tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      include: ["packages/*/src/**/*.ts"],
      exclude: [
        "**/node_modules/**",
        "**/dist/**",
        "**/*.test.ts",
        "**/index.ts",
        "**/types.ts",
      ],
    },
    testTimeout: 15000,
    hookTimeout: 10000,
    pool: "forks",
    fileParallelism: true,
  },
});
