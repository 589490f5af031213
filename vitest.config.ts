/**
 * Root Vitest config for the workspace.
 *
 * Tests live beside the sources in each workspace's src/__tests__ directory.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include        : ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
        environment    : "node",
        passWithNoTests: false,
    },
});
