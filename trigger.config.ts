import { defineConfig } from "@trigger.dev/sdk/v3";
import { esbuildPlugin } from "@trigger.dev/build/extensions";
import path from "path";
import { fileURLToPath } from "url";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
    project: process.env.TRIGGER_PROJECT_REF ?? "proj_url_analyzer",
    runtime: "node",
    logLevel: "info",
    retries: {
        enabledInDev: true,
        default: {
            maxAttempts: 3,
            minTimeoutInMs: 1000,
            maxTimeoutInMs: 10000,
            factor: 2,
            randomize: true,
        },
    },
    dirs: ["./src/trigger"],
    maxDuration: 3600,
    build: {
        external: [
            "playwright",
            "playwright-core",
            "chromium-bidi",
        ],
        extensions: [
            esbuildPlugin({
                name: "path-alias",
                setup(build) {
                    build.onResolve({ filter: /^@\// }, (args) => {
                        const resolved = path.resolve(rootDir, args.path.replace(/^@\//, ""));
                        return { path: resolved + ".ts" };
                    });
                },
            }),
        ],
    },
});
