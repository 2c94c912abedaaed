import * as cheerio from 'cheerio';

// Page chrome that differs between renders of the same content
const NOISE_SELECTORS = [
    'script',
    'style',
    'noscript',
    'template',
    'nav',
    'header',
    'footer',
    'iframe',
    'svg',
];

/**
 * Reduces rendered markup to the text used for content comparison.
 * Strips page chrome, takes the body text and collapses whitespace.
 */
export function extractMainText(markup: string): string {
    const $ = cheerio.load(markup);

    $(NOISE_SELECTORS.join(', ')).remove();

    return $('body').text().replace(/\s+/g, ' ').trim();
}
