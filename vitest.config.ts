import path from "path";
import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
    // Tests must not pick up local .env secrets
    envDir: ".vitest-env",
    resolve: {
        alias: [{ find: /^@\//, replacement: `${rootDir}/` }],
    },
    test: {
        pool: "threads",
        include: ["src/**/*.test.ts", "utils/**/*.test.ts", "packages/**/*.test.ts"],
        exclude: ["**/node_modules/**"],
        testTimeout: 20000,
    },
});
