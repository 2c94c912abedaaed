import { log } from "crawlee";
import { analyzeUrl, analyzeUrls } from "../utils/analysis/analyzer";
import { loadAnalyzerOptions, loadEnvFiles, loadPort } from "../utils/analysis/config";
import { buildServer } from "./server";

// Load .env and .env.local files (must happen before reading env vars)
loadEnvFiles();

const serverLog = log.child({ prefix: "Server" });

async function main() {
    const baseOptions = loadAnalyzerOptions();
    const port = loadPort();

    const server = await buildServer({
        analyzeUrl: (url, overrides) => analyzeUrl(url, overrides, { baseOptions }),
        analyzeUrls: (urls, overrides) => analyzeUrls(urls, overrides, { baseOptions }),
    });

    const shutdown = async (signal: string): Promise<void> => {
        serverLog.info(`Received ${signal}, shutting down`);
        await server.close();
        serverLog.info("Shutdown complete");
        process.exit(0);
    };

    process.on("SIGTERM", () => void shutdown("SIGTERM"));
    process.on("SIGINT", () => void shutdown("SIGINT"));

    try {
        await server.listen({ port, host: "0.0.0.0" });
        serverLog.info("URL analyzer listening", { port, ...baseOptions });
    } catch (err) {
        server.log.error(err);
        process.exit(1);
    }
}

main().catch((error) => {
    serverLog.exception(error instanceof Error ? error : new Error(String(error)), "Server failed to start");
    process.exit(1);
});
