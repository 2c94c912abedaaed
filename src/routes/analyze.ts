import type { FastifyInstance } from "fastify";
import {
    AnalyzeBatchRequestSchema,
    AnalyzeUrlRequestSchema,
    type AnalysisResult,
    type AnalyzerOptions,
} from "@/packages/schemas/url-analysis";
import { toAnalysisResponse } from "../../utils/analysis/analysis-result";

export interface AnalyzeRouteDeps {
    analyzeUrl: (url: string, overrides?: Partial<AnalyzerOptions>) => Promise<AnalysisResult>;
    analyzeUrls: (urls: readonly string[], overrides?: Partial<AnalyzerOptions>) => Promise<AnalysisResult[]>;
}

export interface ErrorEnvelope {
    ok: false;
    error: {
        code: string;
        message: string;
    };
}

function invalidRequest(message: string): ErrorEnvelope {
    return { ok: false, error: { code: "INVALID_REQUEST", message } };
}

export function analyzeRoutes(deps: AnalyzeRouteDeps) {
    return async (fastify: FastifyInstance): Promise<void> => {
        fastify.post("/analyze", async (request, reply) => {
            const parsed = AnalyzeUrlRequestSchema.safeParse(request.body);
            if (!parsed.success) {
                return reply.code(400).send(invalidRequest(parsed.error.issues.map((i) => i.message).join("; ")));
            }

            const { url, timeout } = parsed.data;
            const result = await deps.analyzeUrl(url, timeout !== undefined ? { timeoutMs: timeout } : {});
            return toAnalysisResponse(result);
        });

        fastify.post("/analyze-batch", async (request, reply) => {
            const parsed = AnalyzeBatchRequestSchema.safeParse(request.body);
            if (!parsed.success) {
                return reply.code(400).send(invalidRequest("Body must be a list of URLs or { urls: [...] }"));
            }

            request.log.info({ count: parsed.data.length }, "Batch analysis requested");
            const results = await deps.analyzeUrls(parsed.data);
            return results.map(toAnalysisResponse);
        });
    };
}
