/**
 * URL analyzer entry points
 *
 * Resolves configuration, opens a render session per URL and runs the subset search.
 * Used by the HTTP routes, the Trigger.dev tasks and the CLI.
 */

import { log } from 'crawlee';
import type { AnalysisResult, AnalyzerOptions } from '@/packages/schemas/url-analysis';
import { loadAnalyzerOptions, resolveAnalyzerOptions } from './config';
import { playwrightRendererFactory, type RendererFactory } from './renderer';
import { findMinimalUrl } from './subset-search';
import { failedResult } from './analysis-result';
import { toAnalysisFailure } from './errors';

const analyzerLog = log.child({ prefix: 'UrlAnalyzer' });

export interface AnalyzeDependencies {
    /** Defaults to a Playwright session honouring `waitUntil` */
    openRenderer?: RendererFactory;
    /** Defaults to options loaded from the environment */
    baseOptions?: AnalyzerOptions;
}

export async function analyzeUrl(
    url: string,
    overrides: Partial<AnalyzerOptions> = {},
    deps: AnalyzeDependencies = {},
): Promise<AnalysisResult> {
    let options: AnalyzerOptions;
    try {
        options = resolveAnalyzerOptions(deps.baseOptions ?? loadAnalyzerOptions(), overrides);
    } catch (error) {
        const failure = toAnalysisFailure(error);
        analyzerLog.error(`Cannot analyze ${url}: ${failure.message}`);
        return failedResult({
            originalUrl: url,
            code: failure.code,
            message: failure.message,
            stats: { candidatesEvaluated: 0, startedAt: Date.now() },
        });
    }

    const openRenderer = deps.openRenderer ?? playwrightRendererFactory(options.waitUntil);
    return findMinimalUrl(url, openRenderer, options);
}

function batchConcurrency(overrides: Partial<AnalyzerOptions>, deps: AnalyzeDependencies): number {
    if (overrides.concurrencyLimit !== undefined) return overrides.concurrencyLimit;
    if (deps.baseOptions) return deps.baseOptions.concurrencyLimit;
    try {
        return loadAnalyzerOptions().concurrencyLimit;
    } catch (error) {
        // each run reports the configuration error in its own result
        analyzerLog.warning(`Running batch sequentially: ${toAnalysisFailure(error).message}`);
        return 1;
    }
}

/**
 * Analyzes several URLs with at most `concurrencyLimit` runs in flight.
 * Results keep the input order; one failing URL does not affect the others.
 */
export async function analyzeUrls(
    urls: readonly string[],
    overrides: Partial<AnalyzerOptions> = {},
    deps: AnalyzeDependencies = {},
): Promise<AnalysisResult[]> {
    const limit = Math.max(1, batchConcurrency(overrides, deps));
    const results = new Array<AnalysisResult>(urls.length);
    let next = 0;

    const worker = async (): Promise<void> => {
        while (next < urls.length) {
            const index = next++;
            results[index] = await analyzeUrl(urls[index], overrides, deps);
        }
    };

    analyzerLog.info(`Analyzing batch of ${urls.length} URLs`, { concurrencyLimit: limit });
    await Promise.all(Array.from({ length: Math.min(limit, urls.length) }, () => worker()));

    return results;
}
