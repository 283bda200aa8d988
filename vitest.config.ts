import ts from "typescript";
import { defineConfig } from "vitest/config";

export default defineConfig({
  // Transpile tests with TypeScript itself: esbuild renames named function
  // expressions that shadow an outer binding, which changes Function#toString.
  esbuild: false,
  plugins: [
    {
      name: "typescript-transpile",
      enforce: "pre",
      transform(code, id) {
        if (!/\.[cm]?ts$/.test(id.split("?")[0] ?? "")) return null;
        const out = ts.transpileModule(code, {
          fileName: id,
          compilerOptions: {
            module: ts.ModuleKind.ESNext,
            target: ts.ScriptTarget.ES2022,
            sourceMap: true,
            inlineSources: true,
          },
        });
        return { code: out.outputText, map: out.sourceMapText ?? null };
      },
    },
  ],
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    // No retries: a flaky fallback path should surface immediately.
    retry: 0,
    testTimeout: 10000,
    env: {
      FALLBACK_TRACE: "0",
    },
  },
});
