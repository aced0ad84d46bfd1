import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["stack/**/*.ts"],
      exclude: [
        "tests/**",
        // CLI entry point — process.exit and argv. Its handlers are covered via menu/session tests.
        "stack/budget/cli/main.ts",
        "stack/budget/cli/args.ts",
      ],
      reporter: ["text", "html"],
      reportsDirectory: "coverage",
    },
  },
});
