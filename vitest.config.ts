import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: ["src/**/*.test.ts", "src/**/*.spec.ts"],
    // Debug logging from the environment would interfere with logger assertions
    env: { HTTP_STUB_DEBUG: "false" },
  },
  esbuild: {
    target: "ES2022",
  },
});
