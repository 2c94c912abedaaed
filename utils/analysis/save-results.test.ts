import { describe, expect, it, vi, type Mock } from 'vitest';
import {
    createResultStoreClient,
    RESULTS_TABLE,
    saveAnalysisResult,
    toAnalysisResultRow,
    type ResultStoreClient,
} from './save-results';
import { failedResult } from './analysis-result';

const result = failedResult({
    originalUrl: 'https://example.com/p?a=1',
    allParams: new Map([['a', '1']]),
    code: 'OriginalUnreachable',
    message: 'OriginalUnreachable: timeout',
    stats: { candidatesEvaluated: 0, startedAt: Date.now() },
});

function stubClient(insert: Mock) {
    const from = vi.fn(() => ({ insert }));
    const client: ResultStoreClient = { from };
    return { client, from };
}

describe('toAnalysisResultRow', () => {
    it('maps the result onto table columns', () => {
        expect(toAnalysisResultRow(result)).toEqual({
            original_url: 'https://example.com/p?a=1',
            minimal_url: 'https://example.com/p?a=1',
            required_params: [],
            all_params: { a: '1' },
            status: 'failed',
            similarity: 0,
            error_code: 'OriginalUnreachable',
            error_message: 'OriginalUnreachable: timeout',
            candidates_evaluated: 0,
            duration_ms: result.durationMs,
            analyzed_at: result.analyzedAt,
        });
    });
});

describe('saveAnalysisResult', () => {
    it('is disabled without Supabase credentials', async () => {
        expect(createResultStoreClient({})).toBeNull();
        expect(await saveAnalysisResult(result, null)).toBe(false);
    });

    it('inserts the row into the results table', async () => {
        const insert = vi.fn().mockResolvedValue({ error: null });
        const { client, from } = stubClient(insert);

        expect(await saveAnalysisResult(result, client)).toBe(true);
        expect(from).toHaveBeenCalledWith(RESULTS_TABLE);
        expect(insert).toHaveBeenCalledWith(toAnalysisResultRow(result));
    });

    it('returns false when the insert reports an error', async () => {
        const insert = vi.fn().mockResolvedValue({ error: { message: 'permission denied' } });
        const { client } = stubClient(insert);

        expect(await saveAnalysisResult(result, client)).toBe(false);
    });

    it('returns false without throwing when the insert rejects', async () => {
        const insert = vi.fn().mockRejectedValue(new Error('connection reset'));
        const { client } = stubClient(insert);

        await expect(saveAnalysisResult(result, client)).resolves.toBe(false);
    });
});
