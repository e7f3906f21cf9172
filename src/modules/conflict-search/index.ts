import pLimit from 'p-limit';
import { loadRules, Rules } from '../../config';
import { AvailabilityResult, Diagnostic, RegistryEntry, SimilarityMatch } from '../../types';
import { DataSourceUnavailableError, InternalDefectError, describeError } from '../../utils/errors';
import { StringUtils } from '../../utils/similarity';
import { Normalizer } from '../normalizer';
import { logger } from '../observability';
import { RegistrySource } from '../registry';
import { SimilarityScorer } from '../scorer';

export interface ConflictSearchOptions {
    timeoutMs: number;
    concurrency: number;
    rules?: Rules;
}

type VariationOutcome =
    | { variation: string; ok: true; entries: RegistryEntry[] }
    | { variation: string; ok: false; reason: string };

const log = logger.child('conflict-search');

export class ConflictSearch {
    private readonly rules: Rules;

    constructor(private readonly source: RegistrySource, private readonly options: ConflictSearchOptions) {
        this.rules = options.rules ?? loadRules();
    }

    /**
     * Spellings a registry may have filed the name under: as typed, glued together,
     * upper case and title case. Repeats are dropped.
     */
    static variations(key: string): string[] {
        return [...new Set([key, key.replace(/\s+/g, ''), key.toUpperCase(), StringUtils.titleCase(key)])];
    }

    async findConflicts(normalizedName: string): Promise<AvailabilityResult> {
        if (normalizedName.length === 0) {
            return { available: true, exactMatches: [], similarMatches: [], totalCandidatesExamined: 0, diagnostics: [] };
        }

        const limit = pLimit(this.options.concurrency);
        const outcomes = await Promise.all(
            ConflictSearch.variations(normalizedName).map((variation) => limit(() => this.searchVariation(variation)))
        );

        const failed = outcomes.filter((o): o is Extract<VariationOutcome, { ok: false }> => !o.ok);
        if (failed.length === outcomes.length) {
            log.warn('Registry unavailable, treating name as available', { source: this.source.name, query: normalizedName });
            return {
                available: true,
                exactMatches: [],
                similarMatches: [],
                totalCandidatesExamined: 0,
                diagnostics: [{
                    code: 'DATA_SOURCE_UNAVAILABLE',
                    message: `Registry lookup via ${this.source.name} failed; no conflicts could be checked`,
                    detail: { failures: failed.map((f) => ({ variation: f.variation, reason: f.reason })) },
                }],
            };
        }

        const diagnostics: Diagnostic[] = [];
        if (failed.length > 0) {
            diagnostics.push({
                code: 'DATA_SOURCE_PARTIAL',
                message: `${failed.length} of ${outcomes.length} registry searches failed; results may be incomplete`,
                detail: { failures: failed.map((f) => ({ variation: f.variation, reason: f.reason })) },
            });
        }

        // Merge by concatenation, keep the first occurrence of each identifier
        const seen = new Set<string>();
        const candidates: RegistryEntry[] = [];
        for (const outcome of outcomes) {
            if (!outcome.ok) continue;
            for (const entry of outcome.entries) {
                if (seen.has(entry.identifier)) continue;
                seen.add(entry.identifier);
                candidates.push(entry);
            }
        }

        const { exactMatches, similarMatches } = this.classify(normalizedName, candidates);
        log.debug('Conflict search complete', {
            query: normalizedName,
            candidates: candidates.length,
            exact: exactMatches.length,
            similar: similarMatches.length,
        });

        return {
            available: exactMatches.length === 0 && similarMatches.length === 0,
            exactMatches,
            similarMatches,
            totalCandidatesExamined: candidates.length,
            diagnostics,
        };
    }

    /**
     * Scores every candidate against the key. Pure: the same candidates always classify the same way.
     */
    classify(normalizedName: string, candidates: readonly RegistryEntry[]): { exactMatches: SimilarityMatch[]; similarMatches: SimilarityMatch[] } {
        const { exact_threshold, similar_threshold, max_results } = this.rules.conflict_search;
        const exact: SimilarityMatch[] = [];
        const similar: SimilarityMatch[] = [];

        try {
            for (const entry of candidates) {
                const cleaned = Normalizer.normalize(entry.displayName, this.rules.normalizer.legal_suffixes);
                const similarity = SimilarityScorer.similarity(normalizedName, cleaned);

                if (similarity > exact_threshold) exact.push({ ...entry, similarity });
                else if (similarity > similar_threshold) similar.push({ ...entry, similarity });
            }
        } catch (e) {
            throw new InternalDefectError(`Scoring registry candidates failed: ${describeError(e)}`, e);
        }

        const bySimilarity = (a: SimilarityMatch, b: SimilarityMatch) => b.similarity - a.similarity;
        return {
            exactMatches: exact.sort(bySimilarity).slice(0, max_results),
            similarMatches: similar.sort(bySimilarity).slice(0, max_results),
        };
    }

    private async searchVariation(variation: string): Promise<VariationOutcome> {
        try {
            const entries = await this.fetchWithTimeout(variation);
            return { variation, ok: true, entries };
        } catch (e) {
            log.warn('Registry search failed', { source: this.source.name, variation, error: describeError(e) });
            return { variation, ok: false, reason: describeError(e) };
        }
    }

    private async fetchWithTimeout(query: string): Promise<RegistryEntry[]> {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(
                () => reject(new DataSourceUnavailableError(`Registry lookup timed out after ${this.options.timeoutMs}ms`, { query })),
                this.options.timeoutMs,
            );
        });

        try {
            return await Promise.race([this.source.fetchCandidates(query), timeout]);
        } finally {
            clearTimeout(timer);
        }
    }
}
