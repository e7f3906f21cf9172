import fs from 'fs';
import path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError, describeError } from '../utils/errors';

const phraseList = z.array(z.string().trim().min(1).transform((s) => s.toLowerCase())).min(1);

const RulesSchema = z.object({
    normalizer: z.object({
        legal_suffixes: phraseList,
    }),
    conflict_search: z
        .object({
            exact_threshold: z.number().int().min(0).max(100),
            similar_threshold: z.number().int().min(0).max(100),
            max_results: z.number().int().min(1),
        })
        .refine((c) => c.similar_threshold <= c.exact_threshold, {
            message: 'similar_threshold must not exceed exact_threshold',
        }),
    validator: z
        .object({
            min_length: z.number().int().min(0),
            max_length: z.number().int().min(1),
            error_penalty: z.number().int().min(0),
            warning_penalty: z.number().int().min(0),
            accepted_suffixes: phraseList,
            prohibited_words: phraseList,
        })
        .refine((v) => v.min_length <= v.max_length, {
            message: 'min_length must not exceed max_length',
        }),
});

export type Rules = z.infer<typeof RulesSchema>;

export const DEFAULT_RULES_PATH = path.join(__dirname, '../../src/config/default.yaml');

let rulesInstance: Rules | null = null;

export const parseRules = (raw: unknown): Rules => {
    const result = RulesSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid naming rules: ${issues.join('; ')}`);
    }
    return result.data;
};

export const readRulesFile = (rulesPath: string): Rules => {
    let contents: string;
    try {
        contents = fs.readFileSync(rulesPath, 'utf8');
    } catch (e) {
        throw new ConfigurationError(`Cannot read rules file ${rulesPath}: ${describeError(e)}`);
    }
    return parseRules(yaml.load(contents));
};

/**
 * Loads the rules file. The bundled default is read once and shared;
 * an explicit path is always read fresh.
 */
export const loadRules = (rulesPath?: string): Rules => {
    if (rulesPath) return readRulesFile(rulesPath);
    if (!rulesInstance) {
        rulesInstance = readRulesFile(DEFAULT_RULES_PATH);
    }
    return rulesInstance;
};
