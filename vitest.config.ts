import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@\//,
        replacement: fileURLToPath(
          new URL("./backend/nodejs/src/", import.meta.url)
        ),
      },
    ],
  },
  test: {
    globals: true,
    environment: "node",
    include: ["**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**", "cdk.out/**"],
    env: {
      POWERTOOLS_LOG_LEVEL: "SILENT",
      POWERTOOLS_SERVICE_NAME: "guardian-article-stream-test",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "cdk.out/**",
        "node_modules/**",
        "dist/**",
        "**/*.d.ts",
        "coverage/**",
        "**/*.test.ts",
      ],
    },
  },
});
