import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    coverage: {
      enabled: true,
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts", "src/types.d.ts"],
      reporter: ["json-summary", "text", "text-summary"],
      provider: "v8",
      reportOnFailure: true,
      allowExternal: false,
    },
  },
});
