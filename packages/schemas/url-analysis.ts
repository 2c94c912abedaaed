import { z } from 'zod';

/**
 * Closed status tag for an analysis outcome.
 */
export const AnalysisStatusSchema = z.enum(['success', 'failed']);

export const AnalysisErrorCodeSchema = z.enum([
    'MalformedURL',
    'OriginalUnreachable',
    'CandidateRenderFailure',
    'TooManyParameters',
    'UnexpectedFailure',
]);

/**
 * Serialized form of a URL's query parameters, name -> value.
 */
export const ParameterRecordSchema = z.record(z.string(), z.string());

/**
 * Full outcome record of one analysis run.
 */
export const AnalysisResultSchema = z.object({
    originalUrl: z.string(),
    minimalUrl: z.string(),
    requiredParams: z.array(z.string()),
    allParams: ParameterRecordSchema,
    status: AnalysisStatusSchema,
    similarity: z.number().min(0).max(1),
    errorCode: AnalysisErrorCodeSchema.optional(),
    errorMessage: z.string().optional(),
    candidatesEvaluated: z.number().int().nonnegative(),
    durationMs: z.number().nonnegative(),
    analyzedAt: z.string(),
});

/**
 * Shape returned by the request API and the job-queue tasks.
 */
export const AnalysisResponseSchema = z.object({
    originalUrl: z.string(),
    minimalUrl: z.string(),
    requiredParams: z.array(z.string()),
    status: AnalysisStatusSchema,
    errorMessage: z.string().optional(),
});

export const AnalyzeUrlRequestSchema = z.object({
    url: z.string().url().describe('URL whose query parameters should be minimised'),
    timeout: z.number().int().positive().optional().describe('Per-navigation timeout in milliseconds'),
});

/**
 * Batch body: either a bare list of URLs or `{ urls: [...] }`.
 */
export const AnalyzeBatchRequestSchema = z.union([
    z.array(z.string().url()),
    z.object({ urls: z.array(z.string().url()) }).transform((body) => body.urls),
]);

export const WaitUntilSchema = z.enum(['load', 'domcontentloaded', 'networkidle', 'commit']);

/**
 * Analyzer configuration, coerced from environment strings.
 */
export const AnalyzerOptionsSchema = z.object({
    timeoutMs: z.coerce.number().int().positive().default(30000),
    similarityThreshold: z.coerce.number().gt(0).max(1).default(0.95),
    concurrencyLimit: z.coerce.number().int().positive().default(5),
    maxRetries: z.coerce.number().int().nonnegative().default(0),
    successStatus: z.coerce.number().int().min(100).max(599).default(200),
    maxParams: z.coerce.number().int().nonnegative().default(16),
    maxCombinationSize: z.coerce.number().int().positive().optional(),
    waitUntil: WaitUntilSchema.default('networkidle'),
});

export type AnalysisErrorCode = z.infer<typeof AnalysisErrorCodeSchema>;
export type ParameterRecord = z.infer<typeof ParameterRecordSchema>;
export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;
export type AnalysisResponse = z.infer<typeof AnalysisResponseSchema>;
export type WaitUntil = z.infer<typeof WaitUntilSchema>;
export type AnalyzerOptions = z.infer<typeof AnalyzerOptionsSchema>;
