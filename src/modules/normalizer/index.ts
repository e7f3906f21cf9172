import { loadRules } from '../../config';

export class Normalizer {

    /**
     * Comparison key for a company name: lower-cased, one trailing legal suffix removed,
     * punctuation stripped. Only the first suffix in priority order is tried off the tail.
     */
    static normalize(raw: string, legalSuffixes: readonly string[] = loadRules().normalizer.legal_suffixes): string {
        let n = raw.toLowerCase();

        const suffix = legalSuffixes.find((s) => n.endsWith(s));
        if (suffix) {
            n = n.slice(0, n.length - suffix.length).trimEnd();
        }

        // Remove punctuation
        n = n.replace(/[^a-zA-Z0-9\s]/g, '');
        return n.trim();
    }
}
