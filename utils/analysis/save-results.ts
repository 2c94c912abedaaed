/**
 * Persists analysis results for later review.
 *
 * Write-only: stored rows are never read back to answer an analysis.
 * Enabled when SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are set.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { log } from 'crawlee';
import type { AnalysisResult } from '@/packages/schemas/url-analysis';
import { describeError } from './errors';

const storeLog = log.child({ prefix: 'ResultStore' });

export const RESULTS_TABLE = 'url_analysis_results';

export interface AnalysisResultRow {
    original_url: string;
    minimal_url: string;
    required_params: string[];
    all_params: Record<string, string>;
    status: AnalysisResult['status'];
    similarity: number;
    error_code: string | null;
    error_message: string | null;
    candidates_evaluated: number;
    duration_ms: number;
    analyzed_at: string;
}

export function toAnalysisResultRow(result: AnalysisResult): AnalysisResultRow {
    return {
        original_url: result.originalUrl,
        minimal_url: result.minimalUrl,
        required_params: result.requiredParams,
        all_params: result.allParams,
        status: result.status,
        similarity: result.similarity,
        error_code: result.errorCode ?? null,
        error_message: result.errorMessage ?? null,
        candidates_evaluated: result.candidatesEvaluated,
        duration_ms: result.durationMs,
        analyzed_at: result.analyzedAt,
    };
}

/**
 * The part of the Supabase client the store writes through.
 */
export interface ResultStoreClient {
    from(table: string): {
        insert(row: AnalysisResultRow): PromiseLike<{ error: { message: string } | null }>;
    };
}

export function createResultStoreClient(env: NodeJS.ProcessEnv = process.env): SupabaseClient | null {
    const url = env.SUPABASE_URL;
    const key = env.SUPABASE_SERVICE_ROLE_KEY;
    if (!url || !key) return null;
    return createClient(url, key);
}

/**
 * Inserts one result row. Returns false when storage is disabled or the insert failed;
 * a storage problem never changes the analysis outcome.
 */
export async function saveAnalysisResult(
    result: AnalysisResult,
    client: ResultStoreClient | null = createResultStoreClient(),
): Promise<boolean> {
    if (!client) return false;

    try {
        const { error } = await client.from(RESULTS_TABLE).insert(toAnalysisResultRow(result));
        if (error) {
            storeLog.error(`Error saving analysis result: ${error.message}`, { url: result.originalUrl });
            return false;
        }
        return true;
    } catch (error) {
        storeLog.error(`Error saving analysis result: ${describeError(error)}`, { url: result.originalUrl });
        return false;
    }
}
