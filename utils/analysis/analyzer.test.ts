import { describe, expect, it, vi } from 'vitest';
import { AnalyzerOptionsSchema } from '@/packages/schemas/url-analysis';
import { analyzeUrl, analyzeUrls } from './analyzer';
import { FakeRenderer, htmlPage } from './fake-renderer';
import type { PageRenderer, RenderResult } from './renderer';

const baseOptions = AnalyzerOptionsSchema.parse({});

const ARTICLE = 'Release notes for version two of the product.';

/**
 * Renderer whose pages all match, delaying each render so batch runs overlap.
 */
function trackingFactory() {
    let open = 0;
    let maxOpen = 0;
    let opened = 0;

    const openRenderer = vi.fn(async (): Promise<PageRenderer> => {
        open++;
        opened++;
        maxOpen = Math.max(maxOpen, open);
        return {
            async render(): Promise<RenderResult> {
                await new Promise((resolve) => setTimeout(resolve, 5));
                return htmlPage(ARTICLE);
            },
            async close() {
                open--;
            },
        };
    });

    return { openRenderer, stats: () => ({ open, maxOpen, opened }) };
}

describe('analyzeUrl', () => {
    it('applies per-call overrides', async () => {
        const url = 'https://example.com/page?a=1';
        const renderer = new FakeRenderer(new Map([[url, htmlPage(ARTICLE)]]));
        const render = vi.spyOn(renderer, 'render');

        await analyzeUrl(url, { timeoutMs: 1234 }, { baseOptions, openRenderer: async () => renderer });

        expect(render).toHaveBeenCalledWith(url, 1234);
    });

    it('turns invalid overrides into a failed result', async () => {
        const { openRenderer } = trackingFactory();

        const result = await analyzeUrl(
            'https://example.com/page?a=1',
            { similarityThreshold: 2 },
            { baseOptions, openRenderer },
        );

        expect(result.status).toBe('failed');
        expect(result.errorCode).toBe('UnexpectedFailure');
        expect(result.errorMessage?.startsWith('UnexpectedFailure:')).toBe(true);
        expect(openRenderer).not.toHaveBeenCalled();
    });
});

describe('analyzeUrls', () => {
    it('keeps input order and isolates failures', async () => {
        const { openRenderer } = trackingFactory();
        const urls = [
            'https://example.com/a?x=1',
            'not a url',
            'https://example.com/c?y=2&z=3',
        ];

        const results = await analyzeUrls(urls, {}, { baseOptions, openRenderer });

        expect(results.map((r) => r.originalUrl)).toEqual(urls);
        expect(results.map((r) => r.status)).toEqual(['success', 'failed', 'success']);
        expect(results[0].minimalUrl).toBe('https://example.com/a');
        expect(results[1].errorCode).toBe('MalformedURL');
        expect(results[2].requiredParams).toEqual([]);
    });

    it('opens one session per URL and bounds the sessions in flight', async () => {
        const { openRenderer, stats } = trackingFactory();
        const urls = Array.from({ length: 6 }, (_, i) => `https://example.com/item?id=${i}`);

        await analyzeUrls(urls, { concurrencyLimit: 2 }, { baseOptions, openRenderer });

        expect(stats()).toEqual({ open: 0, maxOpen: 2, opened: 6 });
    });

    it('returns an empty list for an empty batch', async () => {
        const { openRenderer } = trackingFactory();
        expect(await analyzeUrls([], {}, { baseOptions, openRenderer })).toEqual([]);
    });
});
