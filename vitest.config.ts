import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    setupFiles: ["src/__tests__/setup.ts"],
    // image tests chdir into a temp directory, which worker threads do not allow
    pool: "forks",
  },
});
