/**
 * Query parameter codec
 *
 * Splits a URL into its query parameters and rebuilds URLs from any subset of them.
 * Scheme, host, path and fragment always come from the base URL; only the query changes.
 *
 * Example:
 * - `https://example.com/page?b=2&a=1#top` with `{ a: '1' }`
 * - rebuilds as `https://example.com/page?a=1#top`
 */

import type { ParameterRecord } from '@/packages/schemas/url-analysis';
import { UrlAnalysisError } from './errors';

/**
 * Query parameters in first-seen order. Duplicate names keep their first position and last value.
 */
export type ParameterMap = ReadonlyMap<string, string>;

function parseUrl(url: string): URL {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        throw new UrlAnalysisError('MalformedURL', `Cannot parse URL: ${url}`);
    }
    if (!parsed.host) {
        throw new UrlAnalysisError('MalformedURL', `URL has no host: ${url}`);
    }
    return parsed;
}

/**
 * Extract the query parameters of a URL
 *
 * @throws UrlAnalysisError with code MalformedURL when the URL has no scheme or host
 *
 * @example
 * extractParams("https://example.com/page?id=1&utm_source=mail&id=2")
 * // => Map { "id" => "2", "utm_source" => "mail" }
 */
export function extractParams(url: string): ParameterMap {
    const params = new Map<string, string>();
    for (const [name, value] of parseUrl(url).searchParams) {
        params.set(name, value);
    }
    return params;
}

/**
 * Rebuild a URL from a base URL and a parameter subset.
 * Parameters are written sorted by name so the same subset always yields the same string.
 *
 * @example
 * buildUrl("https://example.com/page?x=9#top", new Map([["b", "2"], ["a", "1"]]))
 * // => "https://example.com/page?a=1&b=2#top"
 */
export function buildUrl(baseUrl: string, params: ParameterMap): string {
    const url = parseUrl(baseUrl);
    const sorted = [...params.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    url.search = new URLSearchParams(sorted).toString();
    return url.toString();
}

/**
 * The URL with every query parameter removed.
 *
 * @example
 * stripParams("https://example.com/page?a=1#top")
 * // => "https://example.com/page#top"
 */
export function stripParams(url: string): string {
    return buildUrl(url, new Map());
}

/**
 * Pick the named parameters out of a map, keeping the order of `names`.
 */
export function pickParams(params: ParameterMap, names: readonly string[]): ParameterMap {
    const picked = new Map<string, string>();
    for (const name of names) {
        const value = params.get(name);
        if (value !== undefined) {
            picked.set(name, value);
        }
    }
    return picked;
}

export function toParameterRecord(params: ParameterMap): ParameterRecord {
    return Object.fromEntries(params);
}
