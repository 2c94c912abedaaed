import { task, logger } from "@trigger.dev/sdk/v3";
import { AnalyzeUrlRequestSchema, type AnalysisResponse } from "@/packages/schemas/url-analysis";
import { analyzeUrl } from "../../utils/analysis/analyzer";
import { summarizeBatch, toAnalysisResponse } from "../../utils/analysis/analysis-result";
import { saveAnalysisResult } from "../../utils/analysis/save-results";
import { loadAnalyzerOptions } from "../../utils/analysis/config";

// ============================================================
// Task 1: URL Analysis - minimal parameter set for a single URL
// ============================================================
export const urlAnalysisTask = task({
    id: "url-analysis",
    maxDuration: 3600,
    queue: {
        name: "url-analysis-queue",
        concurrencyLimit: loadAnalyzerOptions().concurrencyLimit,
    },
    run: async (payload: { url: string; timeout?: number }): Promise<AnalysisResponse> => {
        const request = AnalyzeUrlRequestSchema.parse(payload);

        logger.info("Analyzing URL", { url: request.url });

        const result = await analyzeUrl(
            request.url,
            request.timeout !== undefined ? { timeoutMs: request.timeout } : {},
        );

        const saved = await saveAnalysisResult(result);

        logger.info(result.status === "success" ? "✅ Analysis complete" : "❌ Analysis failed", {
            url: result.originalUrl,
            minimalUrl: result.minimalUrl,
            requiredParams: result.requiredParams,
            candidatesEvaluated: result.candidatesEvaluated,
            saved,
            ...(result.errorMessage !== undefined && { error: result.errorMessage }),
        });

        return toAnalysisResponse(result);
    },
});

// ============================================================
// Task 2: Batch Analysis - fans out one run per URL
// ============================================================
export const urlAnalysisBatchTask = task({
    id: "url-analysis-batch",
    maxDuration: 3600,
    run: async (payload: { urls: string[]; timeout?: number }) => {
        if (!Array.isArray(payload?.urls) || payload.urls.length === 0) {
            logger.warn("No URLs provided for batch analysis");
            return summarizeBatch([], []);
        }

        logger.info(`Triggering ${payload.urls.length} URL analyses...`);

        const batch = await urlAnalysisTask.batchTriggerAndWait(
            payload.urls.map((url) => ({
                payload: { url, timeout: payload.timeout },
            }))
        );

        const outcome = summarizeBatch(payload.urls, batch.runs);

        logger.info("🏁 Batch analysis complete", outcome.summary);

        return outcome;
    },
});
