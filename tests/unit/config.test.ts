import path from 'path';
import os from 'os';
import { describe, expect, it } from 'vitest';
import { loadRules, parseRules, readRulesFile } from '../../src/config';
import { loadSettings } from '../../src/config/env';
import { ConfigurationError } from '../../src/utils/errors';

describe('naming rules', () => {
    it('loads the bundled rules file', () => {
        const rules = loadRules();

        expect(rules.normalizer.legal_suffixes).toEqual(['pvt ltd', 'private limited', 'ltd', 'limited', 'pvt', 'private']);
        expect(rules.conflict_search).toEqual({ exact_threshold: 95, similar_threshold: 70, max_results: 5 });
        expect(rules.validator.prohibited_words).toHaveLength(15);
        expect(rules.validator.prohibited_words).toContain('corporation of india');
    });

    it('lower-cases word lists', () => {
        const rules = parseRules({
            ...loadRules(),
            normalizer: { legal_suffixes: ['  LLP '] },
        });

        expect(rules.normalizer.legal_suffixes).toEqual(['llp']);
    });

    it('rejects inverted thresholds', () => {
        expect(() => parseRules({
            ...loadRules(),
            conflict_search: { exact_threshold: 60, similar_threshold: 70, max_results: 5 },
        })).toThrow(ConfigurationError);
    });

    it('rejects a missing rules file', () => {
        expect(() => readRulesFile(path.join(os.tmpdir(), 'no-such-rules.yaml'))).toThrow(ConfigurationError);
    });
});

describe('environment settings', () => {
    it('fills in defaults', () => {
        const settings = loadSettings({});

        expect(settings.REGISTRY_MODE).toBe('static');
        expect(settings.REGISTRY_TIMEOUT_MS).toBe(5000);
        expect(settings.REGISTRY_RETRIES).toBe(2);
        expect(settings.SEARCH_CONCURRENCY).toBe(4);
    });

    it('coerces numeric values', () => {
        expect(loadSettings({ REGISTRY_TIMEOUT_MS: '2500' }).REGISTRY_TIMEOUT_MS).toBe(2500);
    });

    it('requires an api url in api mode', () => {
        expect(() => loadSettings({ REGISTRY_MODE: 'api' })).toThrow(ConfigurationError);
    });

    it('rejects out-of-range retries', () => {
        expect(() => loadSettings({ REGISTRY_RETRIES: '9' })).toThrow('REGISTRY_RETRIES');
    });
});
