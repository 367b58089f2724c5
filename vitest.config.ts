import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include    : ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
        environment: "node",
        testTimeout: 10_000,
        server     : {
            deps: {
                // Plugin modules the loader tests write to temp dirs load through Node's own ESM loader
                external: [/\/mapcore-loader-[^/]*\/.*\.mjs$/],
            },
        },
    },
});
