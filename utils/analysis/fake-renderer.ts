import type { PageRenderer, RenderResult } from './renderer';

export type ScriptedPage = RenderResult | Error;

export const NAVIGATION_FAILED: RenderResult = {
    markup: '',
    status: null,
    error: 'net::ERR_NAME_NOT_RESOLVED',
};

/**
 * Markup with page chrome around `text`, the way a real page would render it.
 */
export function htmlPage(text: string, status = 200): RenderResult {
    return {
        markup: `<html><head><title>Shop</title></head><body><nav>Home | Cart</nav><main>${text}</main><footer>Footer links</footer></body></html>`,
        status,
    };
}

/**
 * In-process renderer that answers from a script keyed by URL.
 * A list of pages is consumed one per call, the last one repeating.
 * Unknown URLs fail navigation.
 */
export class FakeRenderer implements PageRenderer {
    readonly calls: string[] = [];
    closeCount = 0;

    constructor(private readonly pages: ReadonlyMap<string, ScriptedPage | ScriptedPage[]>) {}

    async render(url: string): Promise<RenderResult> {
        this.calls.push(url);
        const scripted = this.pages.get(url);
        const page = Array.isArray(scripted) ? (scripted.length > 1 ? scripted.shift() : scripted[0]) : scripted;
        if (page instanceof Error) throw page;
        return page ?? NAVIGATION_FAILED;
    }

    async close(): Promise<void> {
        this.closeCount++;
    }
}
