import type {
    AnalysisErrorCode,
    AnalysisResponse,
    AnalysisResult,
} from '@/packages/schemas/url-analysis';
import { toParameterRecord, type ParameterMap } from './param-codec';
import { describeError } from './errors';

interface RunStats {
    candidatesEvaluated: number;
    startedAt: number;
}

function timing(stats: RunStats): Pick<AnalysisResult, 'candidatesEvaluated' | 'durationMs' | 'analyzedAt'> {
    return {
        candidatesEvaluated: stats.candidatesEvaluated,
        durationMs: Date.now() - stats.startedAt,
        analyzedAt: new Date().toISOString(),
    };
}

export function successResult(input: {
    originalUrl: string;
    minimalUrl: string;
    requiredParams: readonly string[];
    allParams: ParameterMap;
    similarity: number;
    stats: RunStats;
}): AnalysisResult {
    return {
        originalUrl: input.originalUrl,
        minimalUrl: input.minimalUrl,
        requiredParams: [...input.requiredParams],
        allParams: toParameterRecord(input.allParams),
        status: 'success',
        similarity: input.similarity,
        ...timing(input.stats),
    };
}

/**
 * No candidate below the full set matched: keep every parameter.
 * Similarity is 1 by definition, the original is not compared with itself.
 */
export function fullSetResult(originalUrl: string, allParams: ParameterMap, stats: RunStats): AnalysisResult {
    return successResult({
        originalUrl,
        minimalUrl: originalUrl,
        requiredParams: [...allParams.keys()],
        allParams,
        similarity: 1,
        stats,
    });
}

/**
 * A failed run never reports a reduced URL or partial parameter list.
 */
export function failedResult(input: {
    originalUrl: string;
    allParams?: ParameterMap;
    code: AnalysisErrorCode;
    message: string;
    stats: RunStats;
}): AnalysisResult {
    return {
        originalUrl: input.originalUrl,
        minimalUrl: input.originalUrl,
        requiredParams: [],
        allParams: input.allParams ? toParameterRecord(input.allParams) : {},
        status: 'failed',
        similarity: 0,
        errorCode: input.code,
        errorMessage: input.message,
        ...timing(input.stats),
    };
}

export function toAnalysisResponse(result: AnalysisResult): AnalysisResponse {
    return {
        originalUrl: result.originalUrl,
        minimalUrl: result.minimalUrl,
        requiredParams: result.requiredParams,
        status: result.status,
        ...(result.errorMessage !== undefined && { errorMessage: result.errorMessage }),
    };
}

/** Outcome of one queued analysis run */
export type BatchRunOutcome = { ok: true; output: AnalysisResponse } | { ok: false; error: unknown };

export interface BatchSummary {
    summary: { total: number; successful: number; failed: number };
    results: AnalysisResponse[];
}

/**
 * Pairs each run with the URL it was triggered for. Runs arrive in input order;
 * a run that did not complete is reported as a failed response for its URL.
 */
export function summarizeBatch(urls: readonly string[], runs: readonly BatchRunOutcome[]): BatchSummary {
    const results = runs.map((run, index): AnalysisResponse =>
        run.ok
            ? run.output
            : {
                  originalUrl: urls[index],
                  minimalUrl: urls[index],
                  requiredParams: [],
                  status: 'failed',
                  errorMessage: `UnexpectedFailure: ${describeError(run.error)}`,
              },
    );
    const successful = results.filter((r) => r.status === 'success').length;

    return {
        summary: { total: results.length, successful, failed: results.length - successful },
        results,
    };
}
