import * as levenshtein from 'fast-levenshtein';

export class SimilarityScorer {

    /**
     * Edit-distance ratio scaled to 0..100. Symmetric and case-sensitive:
     * callers normalize before scoring.
     */
    static similarity(a: string, b: string): number {
        const maxLen = Math.max(a.length, b.length);
        if (maxLen === 0) return 100;
        if (a === b) return 100;

        const dist = levenshtein.get(a, b);
        return Math.round(100 * (1 - dist / maxLen));
    }
}
