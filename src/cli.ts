import { loadEnvFiles } from "../utils/analysis/config";
import { analyzeUrls } from "../utils/analysis/analyzer";
import { toAnalysisResponse } from "../utils/analysis/analysis-result";

loadEnvFiles();

async function run() {
    const urls = process.argv.slice(2);
    if (urls.length === 0) {
        console.error("Usage: npm run analyze -- <url> [<url> ...]");
        process.exit(1);
    }

    const results = await analyzeUrls(urls);
    console.log(JSON.stringify(results.map(toAnalysisResponse), null, 2));

    if (results.some((r) => r.status === "failed")) {
        process.exitCode = 1;
    }
}

run().catch((error) => {
    console.error(error);
    process.exit(1);
});
