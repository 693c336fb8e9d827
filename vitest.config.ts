import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
    jsxImportSource: "preact",
  },
  test: {
    include: [
      "shared/*/test/**/*.test.ts",
      "shell/*/test/**/*.test.ts",
      "plugins/*/test/**/*.test.ts",
      "interfaces/*/test/**/*.test.ts",
    ],
    environment: "node",
    pool: "forks",
  },
});
