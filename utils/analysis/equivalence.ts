import { compareTwoStrings } from 'string-similarity';
import { extractMainText } from './content-extractor';
import type { RenderResult } from './renderer';

/**
 * Normalized page text, the unit of comparison.
 */
export type ContentSignal = string;

export interface EquivalenceVerdict {
    isValid: boolean;
    similarity: number;
    transportStatus: number | null;
    error?: string;
    elapsedMs: number;
}

export interface EquivalenceOptions {
    similarityThreshold: number;
    successStatus: number;
}

export function extractSignal(markup: string): ContentSignal {
    return extractMainText(markup);
}

/**
 * Dice coefficient over character bigrams (whitespace ignored). Symmetric, in [0, 1].
 * Two empty signals score 1, one empty signal scores 0.
 */
export function scoreSignals(a: ContentSignal, b: ContentSignal): number {
    if (a.length === 0 && b.length === 0) return 1;
    if (a.length === 0 || b.length === 0) return 0;
    return Math.min(1, Math.max(0, compareTwoStrings(a, b)));
}

/**
 * Judges a rendered candidate against the reference signal.
 * Render failures end up in the verdict and are never thrown.
 */
export function judgeCandidate(
    reference: ContentSignal,
    candidate: RenderResult,
    options: EquivalenceOptions,
    elapsedMs = 0,
): EquivalenceVerdict {
    if (candidate.status === null || candidate.markup.length === 0) {
        return {
            isValid: false,
            similarity: 0,
            transportStatus: candidate.status,
            error: `CandidateRenderFailure: ${candidate.error ?? 'no content returned'}`,
            elapsedMs,
        };
    }

    const similarity = scoreSignals(reference, extractSignal(candidate.markup));

    if (candidate.status !== options.successStatus) {
        return {
            isValid: false,
            similarity,
            transportStatus: candidate.status,
            error: `Unexpected status ${candidate.status}`,
            elapsedMs,
        };
    }

    return {
        isValid: similarity >= options.similarityThreshold,
        similarity,
        transportStatus: candidate.status,
        elapsedMs,
    };
}
