import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["src/**/*.spec.ts"],
        environment: "node",
        ui: false,
        testTimeout: 30_000,
        hookTimeout: 30_000,
        // The collection test in memory.spec.ts drives the garbage collector by hand.
        pool: "forks",
        poolOptions: {
            forks: {
                execArgv: ["--expose-gc"],
            },
        },
        coverage: {
            provider: "istanbul",
        },
    },
});
