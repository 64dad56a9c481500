/**
 * @file Vitest testing framework configuration
 *
 * Globals are on so specs use describe/it/expect without imports; the node
 * environment gives them real filesystem and socket access.
 */

import { defineConfig } from "vitest/config";
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.ts", "spec/**/*.spec.ts"],
  },
});
