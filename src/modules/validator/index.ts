import { loadRules, Rules } from '../../config';
import { ValidationResult } from '../../types';
import { InternalDefectError, describeError } from '../../utils/errors';

const ALLOWED_CHARACTERS = /[^a-zA-Z0-9\s.\-&()]/;

/**
 * MCA naming conventions, checked on the name exactly as typed:
 * case, punctuation and stray whitespace all matter here.
 */
export class ConventionValidator {
    private readonly rules: Rules['validator'];

    constructor(rules: Rules = loadRules()) {
        this.rules = rules.validator;
    }

    validate(name: string): ValidationResult {
        try {
            return this.applyRules(name);
        } catch (e) {
            throw new InternalDefectError(`Naming rule evaluation failed: ${describeError(e)}`, e);
        }
    }

    private applyRules(name: string): ValidationResult {
        const errors: string[] = [];
        const warnings: string[] = [];
        const { min_length, max_length, accepted_suffixes, prohibited_words, error_penalty, warning_penalty } = this.rules;

        // Code points, not UTF-16 units
        const length = [...name].length;
        if (length < min_length) {
            errors.push(`Company name too short (minimum ${min_length} characters)`);
        } else if (length > max_length) {
            errors.push(`Company name too long (maximum ${max_length} characters)`);
        }

        const lower = name.toLowerCase();
        for (const word of prohibited_words) {
            if (lower.includes(word)) {
                errors.push(`Prohibited word '${word}' found in name`);
            }
        }

        if (!accepted_suffixes.some((suffix) => lower.endsWith(suffix))) {
            warnings.push('Consider adding proper suffix (Pvt Ltd or Private Limited)');
        }

        if (ALLOWED_CHARACTERS.test(name)) {
            warnings.push('Special characters may cause issues during incorporation');
        }

        if (/^\p{Nd}/u.test(name)) {
            errors.push('Company name cannot start with a number');
        }

        if (/\s{2,}/.test(name)) {
            warnings.push('Multiple consecutive spaces found');
        }

        if (name !== name.trim()) {
            warnings.push('Leading or trailing spaces detected');
        }

        return {
            isValid: errors.length === 0,
            errors,
            warnings,
            score: Math.max(0, 100 - errors.length * error_penalty - warnings.length * warning_penalty),
        };
    }
}
