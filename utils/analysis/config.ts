import * as dotenv from 'dotenv';
import { AnalyzerOptionsSchema, type AnalyzerOptions } from '@/packages/schemas/url-analysis';

const ENV_KEYS: Record<keyof AnalyzerOptions, string> = {
    timeoutMs: 'URL_ANALYZER_TIMEOUT_MS',
    similarityThreshold: 'URL_ANALYZER_SIMILARITY_THRESHOLD',
    concurrencyLimit: 'URL_ANALYZER_CONCURRENCY_LIMIT',
    maxRetries: 'URL_ANALYZER_MAX_RETRIES',
    successStatus: 'URL_ANALYZER_SUCCESS_STATUS',
    maxParams: 'URL_ANALYZER_MAX_PARAMS',
    maxCombinationSize: 'URL_ANALYZER_MAX_COMBINATION_SIZE',
    waitUntil: 'URL_ANALYZER_WAIT_UNTIL',
};

const ENV_KEY_BY_OPTION = new Map<string, string>(Object.entries(ENV_KEYS));

let envLoaded = false;

/**
 * Loads `.env` then `.env.local` (overriding) once per process.
 */
export function loadEnvFiles(): void {
    if (envLoaded) return;
    dotenv.config();
    dotenv.config({ path: '.env.local', override: true });
    envLoaded = true;
}

/**
 * Builds analyzer options from environment variables. Unset or blank
 * variables fall back to the schema defaults.
 *
 * @throws Error naming every invalid variable
 */
export function loadAnalyzerOptions(env: NodeJS.ProcessEnv = process.env): AnalyzerOptions {
    const raw: Record<string, string> = {};
    for (const [option, key] of Object.entries(ENV_KEYS)) {
        const value = env[key]?.trim();
        if (value) {
            raw[option] = value;
        }
    }

    const parsed = AnalyzerOptionsSchema.safeParse(raw);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => {
            const option = String(issue.path[0]);
            return `${ENV_KEY_BY_OPTION.get(option) ?? option}: ${issue.message}`;
        });
        throw new Error(`Invalid analyzer configuration: ${problems.join('; ')}`);
    }
    return parsed.data;
}

/**
 * Merges per-call overrides over a base configuration and re-validates the result.
 */
export function resolveAnalyzerOptions(
    base: AnalyzerOptions,
    overrides: Partial<AnalyzerOptions> = {},
): AnalyzerOptions {
    const defined = Object.fromEntries(
        Object.entries(overrides).filter(([, value]) => value !== undefined),
    );
    return AnalyzerOptionsSchema.parse({ ...base, ...defined });
}

export function loadPort(env: NodeJS.ProcessEnv = process.env): number {
    const port = Number.parseInt(env.PORT ?? '8000', 10);
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
        throw new Error(`Invalid PORT: ${env.PORT}`);
    }
    return port;
}
