import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

export default defineConfig({
    resolve: {
        alias: {
            "@confrest/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
        },
    },
    test: {
        include    : [
            "packages/*/src/**/*.test.ts",
            "apps/*/src/**/*.test.ts",
        ],
        environment: "node",
    },
});
