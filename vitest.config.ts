import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: "node",
    include: [
      "libs/*/src/**/*.test.ts",
      "libs/*/tests/**/*.test.ts",
      "drivers/*/tests/**/*.test.ts",
      "services/*/tests/**/*.test.ts"
    ],
    coverage: {
      reporter: ["text", "lcov"],
      include: ["libs/*/src/**", "drivers/*/src/**", "services/*/src/**"]
    }
  }
});
