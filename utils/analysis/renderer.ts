/**
 * Rendering session
 *
 * One browser context per analysis run, reused for every candidate URL and
 * closed on every exit path. Each URL is rendered in a fresh page.
 */

import { launchPlaywright, log } from 'crawlee';
import type { Browser, BrowserContext } from 'playwright';
import type { WaitUntil } from '@/packages/schemas/url-analysis';
import { describeError } from './errors';

const rendererLog = log.child({ prefix: 'Renderer' });

export interface RenderResult {
    markup: string;
    /** HTTP status of the main document, null when navigation failed */
    status: number | null;
    error?: string;
}

export interface PageRenderer {
    /**
     * Navigation failures and timeouts resolve with `status: null`; only
     * conditions outside a single navigation reject.
     */
    render(url: string, timeoutMs: number): Promise<RenderResult>;
    close(): Promise<void>;
}

export type RendererFactory = () => Promise<PageRenderer>;

export class PlaywrightPageRenderer implements PageRenderer {
    private constructor(
        private readonly browser: Browser,
        private readonly context: BrowserContext,
        private readonly waitUntil: WaitUntil,
    ) {}

    static async open(waitUntil: WaitUntil = 'networkidle'): Promise<PlaywrightPageRenderer> {
        const browser = await launchPlaywright({
            launchOptions: {
                headless: true,
                args: [
                    '--no-sandbox',
                    '--disable-setuid-sandbox',
                    '--disable-dev-shm-usage',
                    '--disable-blink-features=AutomationControlled',
                ],
            },
        });

        try {
            const context = await browser.newContext();
            return new PlaywrightPageRenderer(browser, context, waitUntil);
        } catch (error) {
            await browser.close();
            throw error;
        }
    }

    async render(url: string, timeoutMs: number): Promise<RenderResult> {
        const page = await this.context.newPage();
        try {
            const response = await page.goto(url, { timeout: timeoutMs, waitUntil: this.waitUntil });
            const markup = await page.content();
            return { markup, status: response ? response.status() : null };
        } catch (error) {
            return { markup: '', status: null, error: describeError(error) };
        } finally {
            await page.close();
        }
    }

    async close(): Promise<void> {
        await this.context.close();
        await this.browser.close();
    }
}

export function playwrightRendererFactory(waitUntil: WaitUntil): RendererFactory {
    return () => PlaywrightPageRenderer.open(waitUntil);
}

/**
 * Opens a renderer, runs `fn` with it and always closes it afterwards.
 * A failing close is logged and does not replace the result of `fn`.
 */
export async function withRenderSession<T>(
    openRenderer: RendererFactory,
    fn: (renderer: PageRenderer) => Promise<T>,
): Promise<T> {
    const renderer = await openRenderer();
    try {
        return await fn(renderer);
    } finally {
        try {
            await renderer.close();
        } catch (error) {
            rendererLog.warning(`Failed to close render session: ${describeError(error)}`);
        }
    }
}
