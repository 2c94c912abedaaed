import type { AnalysisErrorCode } from '@/packages/schemas/url-analysis';

/**
 * Error that ends an analysis run: MalformedURL, TooManyParameters or OriginalUnreachable.
 * A failed candidate render is recorded on its verdict and never thrown.
 */
export class UrlAnalysisError extends Error {
    constructor(
        public readonly code: AnalysisErrorCode,
        message: string,
    ) {
        super(message);
        this.name = 'UrlAnalysisError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Maps any thrown value onto a run-level error code and message.
 */
export function toAnalysisFailure(error: unknown): { code: AnalysisErrorCode; message: string } {
    if (error instanceof UrlAnalysisError) {
        return { code: error.code, message: `${error.code}: ${error.message}` };
    }
    return { code: 'UnexpectedFailure', message: `UnexpectedFailure: ${describeError(error)}` };
}
