import { describe, expect, it } from 'vitest';
import { judgeCandidate, scoreSignals } from './equivalence';
import { htmlPage, NAVIGATION_FAILED } from './fake-renderer';

const OPTIONS = { similarityThreshold: 0.95, successStatus: 200 };

describe('scoreSignals', () => {
    it('scores identical signals as 1', () => {
        expect(scoreSignals('Quarterly report', 'Quarterly report')).toBe(1);
    });

    it('handles empty signals', () => {
        expect(scoreSignals('', '')).toBe(1);
        expect(scoreSignals('content', '')).toBe(0);
        expect(scoreSignals('', 'content')).toBe(0);
    });

    it('computes the bigram Dice coefficient', () => {
        // shared bigram: "ht"
        expect(scoreSignals('night', 'nacht')).toBe(0.25);
    });

    it('is symmetric', () => {
        const a = 'the quick brown fox jumps';
        const b = 'a quick brown dog sleeps';
        expect(scoreSignals(a, b)).toBe(scoreSignals(b, a));
    });

    it('grows with shared content', () => {
        const reference = 'the quick brown fox jumps over the lazy dog';
        const close = scoreSignals(reference, 'the quick brown fox jumps over the lazy cat');
        const far = scoreSignals(reference, 'completely unrelated words here');
        expect(close).toBeGreaterThan(far);
        expect(close).toBeLessThan(1);
    });
});

describe('judgeCandidate', () => {
    it('accepts the same content with a success status', () => {
        const verdict = judgeCandidate('Hello world', htmlPage('Hello world'), OPTIONS, 12);
        expect(verdict).toEqual({ isValid: true, similarity: 1, transportStatus: 200, elapsedMs: 12 });
    });

    it('rejects a navigation failure without throwing', () => {
        const verdict = judgeCandidate('Hello world', NAVIGATION_FAILED, OPTIONS);
        expect(verdict.isValid).toBe(false);
        expect(verdict.similarity).toBe(0);
        expect(verdict.transportStatus).toBeNull();
        expect(verdict.error).toBe('CandidateRenderFailure: net::ERR_NAME_NOT_RESOLVED');
    });

    it('rejects the same content with another status', () => {
        const verdict = judgeCandidate('Hello world', htmlPage('Hello world', 404), OPTIONS);
        expect(verdict.isValid).toBe(false);
        expect(verdict.similarity).toBe(1);
        expect(verdict.error).toBe('Unexpected status 404');
    });

    it('rejects content below the threshold', () => {
        const verdict = judgeCandidate('night', htmlPage('nacht'), OPTIONS);
        expect(verdict.isValid).toBe(false);
        expect(verdict.similarity).toBe(0.25);
        expect(verdict.error).toBeUndefined();
    });

    it('honours a custom success status', () => {
        const verdict = judgeCandidate('Hello', htmlPage('Hello', 203), { similarityThreshold: 0.9, successStatus: 203 });
        expect(verdict.isValid).toBe(true);
    });
});
