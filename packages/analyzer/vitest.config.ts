import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const src = (path: string) =>
  fileURLToPath(new URL(`./src/${path}`, import.meta.url));

export default defineConfig({
  test: {
    name: "analyzer",
    globals: true,
    environment: "node",
    root: fileURLToPath(new URL(".", import.meta.url)),
    include: ["src/**/*.test.ts"],
  },
  resolve: {
    alias: [
      { find: /^#analysis\/(.*)$/, replacement: src("analysis/$1.ts") },
      { find: /^#analysis$/, replacement: src("analysis/index.ts") },
      { find: /^#ast$/, replacement: src("ast/index.ts") },
      { find: /^#costs$/, replacement: src("costs/index.ts") },
      { find: /^#errors$/, replacement: src("errors.ts") },
      { find: /^#parser$/, replacement: src("parser/index.ts") },
      { find: /^#result$/, replacement: src("result.ts") },
      { find: /^#types$/, replacement: src("types/index.ts") },
    ],
  },
});
