import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        // The observer is a process-wide singleton; keep event assertions
        // from interleaving across files.
        fileParallelism: false,
        sequence: {
            concurrent: false,
        },
        env: {
            // ansis decides color support at import time
            FORCE_COLOR: "3",
            NO_COLOR: "",
        },
    },
});
