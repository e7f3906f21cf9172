import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConflictSearch } from '../../src/modules/conflict-search';
import { StaticRegistrySource } from '../../src/modules/registry';
import { SimilarityScorer } from '../../src/modules/scorer';
import { RegistryEntry } from '../../src/types';
import { InternalDefectError } from '../../src/utils/errors';

const OPTIONS = { timeoutMs: 200, concurrency: 4 };

const entry = (displayName: string, identifier: string): RegistryEntry => ({ displayName, identifier });

describe('ConflictSearch.variations', () => {
    it('searches glued, upper and title case spellings', () => {
        expect(ConflictSearch.variations('xyz technology')).toEqual([
            'xyz technology',
            'xyztechnology',
            'XYZ TECHNOLOGY',
            'Xyz Technology',
        ]);
    });

    it('drops repeated spellings', () => {
        expect(ConflictSearch.variations('abc')).toEqual(['abc', 'ABC', 'Abc']);
    });
});

describe('ConflictSearch.findConflicts', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('splits candidates into exact and similar matches', async () => {
        const source = new StaticRegistrySource([
            entry('XYZ Technology Private Limited', 'U1'),
            entry('XYZ Technologies Pvt Ltd', 'U2'),
            entry('Orbit Foods Ltd', 'U3'),
        ]);

        const result = await new ConflictSearch(source, OPTIONS).findConflicts('xyz technology');

        expect(result.available).toBe(false);
        expect(result.exactMatches).toEqual([{ displayName: 'XYZ Technology Private Limited', identifier: 'U1', similarity: 100 }]);
        expect(result.similarMatches).toEqual([{ displayName: 'XYZ Technologies Pvt Ltd', identifier: 'U2', similarity: 80 }]);
        expect(result.totalCandidatesExamined).toBe(3);
        expect(result.diagnostics).toEqual([]);
    });

    it('reports a name with no close neighbours as available', async () => {
        const source = new StaticRegistrySource([entry('Xylo Textiles Ltd', 'U9')]);

        const result = await new ConflictSearch(source, OPTIONS).findConflicts('xyz technology');

        expect(result.available).toBe(true);
        expect(result.exactMatches).toEqual([]);
        expect(result.similarMatches).toEqual([]);
    });

    it('counts each registry entry once across variations', async () => {
        const fetchCandidates = vi.fn(async () => [entry('Xyz Technology Ltd', 'U1')]);

        const result = await new ConflictSearch({ name: 'Fake', fetchCandidates }, OPTIONS).findConflicts('xyz technology');

        expect(fetchCandidates).toHaveBeenCalledTimes(4);
        expect(result.totalCandidatesExamined).toBe(1);
        expect(result.exactMatches).toHaveLength(1);
    });

    it('skips the registry for an empty key', async () => {
        const fetchCandidates = vi.fn(async () => []);

        const result = await new ConflictSearch({ name: 'Fake', fetchCandidates }, OPTIONS).findConflicts('');

        expect(fetchCandidates).not.toHaveBeenCalled();
        expect(result.available).toBe(true);
        expect(result.totalCandidatesExamined).toBe(0);
    });

    it('fails open with a diagnostic when the registry is down', async () => {
        const source = {
            name: 'Down',
            fetchCandidates: async (): Promise<RegistryEntry[]> => {
                throw new Error('connect ECONNREFUSED');
            },
        };

        const result = await new ConflictSearch(source, OPTIONS).findConflicts('xyz technology');

        expect(result.available).toBe(true);
        expect(result.totalCandidatesExamined).toBe(0);
        expect(result.diagnostics).toHaveLength(1);
        expect(result.diagnostics[0].code).toBe('DATA_SOURCE_UNAVAILABLE');
        expect(result.diagnostics[0].message).toBe('Registry lookup via Down failed; no conflicts could be checked');
    });

    it('treats a registry that never answers as unavailable', async () => {
        const source = {
            name: 'Hanging',
            fetchCandidates: () => new Promise<RegistryEntry[]>(() => undefined),
        };

        const result = await new ConflictSearch(source, { timeoutMs: 20, concurrency: 4 }).findConflicts('xyz technology');

        expect(result.available).toBe(true);
        expect(result.diagnostics[0].code).toBe('DATA_SOURCE_UNAVAILABLE');
    });

    it('keeps partial results when some searches fail', async () => {
        const source = {
            name: 'Flaky',
            fetchCandidates: async (query: string): Promise<RegistryEntry[]> => {
                if (query === 'XYZ TECHNOLOGY') throw new Error('503');
                return [entry('XYZ Technology Pvt Ltd', 'U1')];
            },
        };

        const result = await new ConflictSearch(source, OPTIONS).findConflicts('xyz technology');

        expect(result.available).toBe(false);
        expect(result.exactMatches.map((m) => m.identifier)).toEqual(['U1']);
        expect(result.diagnostics).toEqual([{
            code: 'DATA_SOURCE_PARTIAL',
            message: '1 of 4 registry searches failed; results may be incomplete',
            detail: { failures: [{ variation: 'XYZ TECHNOLOGY', reason: '503' }] },
        }]);
    });

    it('propagates scorer failures as internal defects', async () => {
        vi.spyOn(SimilarityScorer, 'similarity').mockImplementation(() => {
            throw new Error('scorer exploded');
        });
        const source = new StaticRegistrySource([entry('XYZ Technology Ltd', 'U1')]);

        await expect(new ConflictSearch(source, OPTIONS).findConflicts('xyz technology')).rejects.toBeInstanceOf(InternalDefectError);
    });
});

describe('ConflictSearch.classify', () => {
    const base = 'abcdefghijklmnopqrst';
    const tail = (k: number, c = 'x') => base.slice(0, base.length - k) + c.repeat(k);
    const search = new ConflictSearch(new StaticRegistrySource([]), OPTIONS);

    it('ranks by similarity, keeps source order on ties and caps at five', () => {
        const { exactMatches, similarMatches } = search.classify(base, [
            entry(tail(4), 'k4'),
            entry(tail(1), 'k1x'),
            entry(tail(6), 'k6'),
            entry(tail(2), 'k2x'),
            entry(tail(1, 'y'), 'k1y'),
            entry(tail(5), 'k5'),
            entry(tail(3), 'k3'),
            entry(tail(2, 'y'), 'k2y'),
            entry(base, 'exact'),
        ]);

        expect(exactMatches.map((m) => [m.identifier, m.similarity])).toEqual([['exact', 100]]);
        expect(similarMatches.map((m) => [m.identifier, m.similarity])).toEqual([
            ['k1x', 95],
            ['k1y', 95],
            ['k2x', 90],
            ['k2y', 90],
            ['k3', 85],
        ]);
    });

    it('treats thresholds as strict bounds', () => {
        const { exactMatches, similarMatches } = search.classify(base, [entry(tail(1), 'at95'), entry(tail(6), 'at70')]);

        expect(exactMatches).toEqual([]);
        expect(similarMatches.map((m) => m.identifier)).toEqual(['at95']);
    });
});
