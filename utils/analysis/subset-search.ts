/**
 * Minimal parameter set search
 *
 * Finds the smallest subset of a URL's query parameters whose URL renders the
 * same content as the original.
 *
 * Order of work:
 * 1. Parse parameters (MalformedURL / TooManyParameters end the run before any render)
 * 2. Render the original once; its text is the reference for every comparison
 * 3. Probe the URL with no parameters
 * 4. Try every combination of size r = 1..n, in combinatorial order, stopping at the first match
 * 5. Nothing matched: keep all parameters (similarity 1 by definition)
 *
 * Candidates are evaluated one at a time in that order, so the first accepted
 * candidate always has the fewest parameters. Worst case renders 2^n candidates
 * (the baseline plus every non-empty subset); `maxParams` and
 * `maxCombinationSize` bound it.
 */

import { log } from 'crawlee';
import type { AnalysisResult, AnalyzerOptions } from '@/packages/schemas/url-analysis';
import { buildUrl, extractParams, pickParams, stripParams, type ParameterMap } from './param-codec';
import { extractSignal, judgeCandidate, type ContentSignal, type EquivalenceVerdict } from './equivalence';
import { withRenderSession, type PageRenderer, type RenderResult, type RendererFactory } from './renderer';
import { describeError, toAnalysisFailure, UrlAnalysisError } from './errors';
import { failedResult, fullSetResult, successResult } from './analysis-result';

const searchLog = log.child({ prefix: 'SubsetSearch' });

/**
 * All `size`-element combinations of `items`, in lexicographic order of positions.
 *
 * @example
 * [...combinations(['a', 'b', 'c'], 2)]
 * // => [['a', 'b'], ['a', 'c'], ['b', 'c']]
 */
export function* combinations<T>(items: readonly T[], size: number): Generator<T[]> {
    if (size < 0 || size > items.length) return;

    const indices = Array.from({ length: size }, (_, i) => i);
    while (true) {
        yield indices.map((i) => items[i]);

        // Rightmost index that can still move forward
        let pivot = size - 1;
        while (pivot >= 0 && indices[pivot] === items.length - size + pivot) {
            pivot--;
        }
        if (pivot < 0) return;

        indices[pivot]++;
        for (let j = pivot + 1; j < size; j++) {
            indices[j] = indices[j - 1] + 1;
        }
    }
}

interface Candidate {
    names: string[];
    url: string;
}

/**
 * Baseline first, then combinations by ascending size.
 */
function* candidates(baseUrl: string, params: ParameterMap, maxSize: number): Generator<Candidate> {
    yield { names: [], url: baseUrl };

    const names = [...params.keys()];
    for (let size = 1; size <= Math.min(names.length, maxSize); size++) {
        for (const combo of combinations(names, size)) {
            yield { names: combo, url: buildUrl(baseUrl, pickParams(params, combo)) };
        }
    }
}

/**
 * Renders a URL, re-attempting navigation failures up to `maxRetries` times.
 * A rejected render becomes a failed RenderResult.
 */
async function renderWithRetry(
    renderer: PageRenderer,
    url: string,
    options: Pick<AnalyzerOptions, 'timeoutMs' | 'maxRetries'>,
): Promise<RenderResult> {
    let result: RenderResult = { markup: '', status: null };
    for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
        try {
            result = await renderer.render(url, options.timeoutMs);
        } catch (error) {
            result = { markup: '', status: null, error: describeError(error) };
        }
        if (result.status !== null) return result;
        if (attempt < options.maxRetries) {
            searchLog.debug(`Retrying ${url} (${attempt + 1}/${options.maxRetries}): ${result.error ?? 'no response'}`);
        }
    }
    return result;
}

async function evaluateCandidate(
    renderer: PageRenderer,
    reference: ContentSignal,
    candidate: Candidate,
    options: AnalyzerOptions,
): Promise<EquivalenceVerdict> {
    const startedAt = Date.now();
    const rendered = await renderWithRetry(renderer, candidate.url, options);
    return judgeCandidate(reference, rendered, options, Date.now() - startedAt);
}

async function searchWithRenderer(
    url: string,
    params: ParameterMap,
    renderer: PageRenderer,
    options: AnalyzerOptions,
    stats: { candidatesEvaluated: number; startedAt: number },
): Promise<AnalysisResult> {
    const original = await renderWithRetry(renderer, url, options);
    if (original.status === null || original.markup.length === 0) {
        throw new UrlAnalysisError('OriginalUnreachable', original.error ?? `No content returned for ${url}`);
    }
    if (original.status !== options.successStatus) {
        searchLog.warning(`Original page answered with status ${original.status}`, { url });
    }

    const reference = extractSignal(original.markup);
    const maxSize = options.maxCombinationSize ?? params.size;

    for (const candidate of candidates(stripParams(url), params, maxSize)) {
        stats.candidatesEvaluated++;
        const verdict = await evaluateCandidate(renderer, reference, candidate, options);

        searchLog.debug(`Candidate ${candidate.url}`, {
            params: candidate.names,
            similarity: Number(verdict.similarity.toFixed(4)),
            status: verdict.transportStatus,
            elapsedMs: verdict.elapsedMs,
            ...(verdict.error !== undefined && { error: verdict.error }),
        });

        if (verdict.isValid) {
            return successResult({
                originalUrl: url,
                minimalUrl: candidate.url,
                requiredParams: candidate.names,
                allParams: params,
                similarity: verdict.similarity,
                stats,
            });
        }
    }

    return fullSetResult(url, params, stats);
}

/**
 * Runs one analysis. Always resolves; every run-level error becomes a failed result.
 */
export async function findMinimalUrl(
    url: string,
    openRenderer: RendererFactory,
    options: AnalyzerOptions,
): Promise<AnalysisResult> {
    const stats = { candidatesEvaluated: 0, startedAt: Date.now() };
    let params: ParameterMap | undefined;

    try {
        params = extractParams(url);
        if (params.size > options.maxParams) {
            throw new UrlAnalysisError(
                'TooManyParameters',
                `${params.size} parameters exceed the limit of ${options.maxParams}`,
            );
        }

        searchLog.info(`Analyzing ${url}`, { params: params.size });

        const known = params;
        const result = await withRenderSession(openRenderer, (renderer) =>
            searchWithRenderer(url, known, renderer, options, stats),
        );

        searchLog.info(`Finished ${url}`, {
            requiredParams: result.requiredParams,
            candidatesEvaluated: result.candidatesEvaluated,
        });
        return result;
    } catch (error) {
        const failure = toAnalysisFailure(error);
        searchLog.error(`Analysis failed for ${url}: ${failure.message}`);
        return failedResult({
            originalUrl: url,
            allParams: params,
            code: failure.code,
            message: failure.message,
            stats,
        });
    }
}
