import { defineConfig } from "vitest/config";

// capstone-wasm resolves its .wasm next to its own module; keep it out of
// dependency pre-bundling so that lookup still works under the test runner.
export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    server: {
      deps: {
        external: ["capstone-wasm"],
      },
    },
  },
});
