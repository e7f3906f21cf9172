import pLimit from 'p-limit';
import { loadRules, Rules } from '../../config';
import { AvailabilityResult, EngineResult, NameCheckReport, ReportedCompany, SimilarityMatch, ValidationResult } from '../../types';
import { InternalDefectError, describeError } from '../../utils/errors';
import { ConflictSearch } from '../conflict-search';
import { Normalizer } from '../normalizer';
import { logger } from '../observability';
import { Recommender } from '../recommender';
import { RegistrySource } from '../registry';
import { ConventionValidator } from '../validator';

export interface AvailabilityChecker {
    findConflicts(normalizedName: string): Promise<AvailabilityResult>;
}

export interface NameValidator {
    validate(name: string): ValidationResult;
}

export interface EngineOptions {
    rules?: Rules;
    timeoutMs?: number;
    concurrency?: number;
    conflictSearch?: AvailabilityChecker;
    validator?: NameValidator;
}

const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_CONCURRENCY = 4;

const log = logger.child('engine');

/**
 * Single entry point: one candidate name in, one complete result out.
 * Holds nothing but its collaborators, so one instance can serve concurrent calls.
 */
export class NameCheckEngine {
    private readonly rules: Rules;
    private readonly conflictSearch: AvailabilityChecker;
    private readonly validator: NameValidator;
    private readonly concurrency: number;

    constructor(source: RegistrySource, options: EngineOptions = {}) {
        this.rules = options.rules ?? loadRules();
        this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
        this.conflictSearch = options.conflictSearch ?? new ConflictSearch(source, {
            timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            concurrency: this.concurrency,
            rules: this.rules,
        });
        this.validator = options.validator ?? new ConventionValidator(this.rules);
    }

    async check(name: string): Promise<EngineResult> {
        const started = Date.now();
        const normalizedKey = Normalizer.normalize(name, this.rules.normalizer.legal_suffixes);

        const [availability, validation] = await Promise.all([
            this.checkAvailability(normalizedKey),
            this.runValidation(name),
        ]);

        const result: EngineResult = deepFreeze({
            name,
            normalizedKey,
            availability: copyAvailability(availability),
            validation: { ...validation, errors: [...validation.errors], warnings: [...validation.warnings] },
            recommendation: Recommender.recommend(availability, validation),
        });

        log.info('Name checked', {
            company_name: name,
            available: availability.available,
            valid: validation.isValid,
            diagnostics: availability.diagnostics.map((d) => d.code),
            duration_ms: Date.now() - started,
        });
        return result;
    }

    /**
     * Checks several names independently; results come back in input order.
     */
    async checkMany(names: readonly string[]): Promise<EngineResult[]> {
        const limit = pLimit(this.concurrency);
        return Promise.all(names.map((name) => limit(() => this.check(name))));
    }

    private async checkAvailability(normalizedKey: string): Promise<AvailabilityResult> {
        try {
            return await this.conflictSearch.findConflicts(normalizedKey);
        } catch (e) {
            if (e instanceof InternalDefectError) throw e;

            // Fail open: missing evidence must not block the applicant
            log.error('Availability check failed, degrading to available', e, { query: normalizedKey });
            return {
                available: true,
                exactMatches: [],
                similarMatches: [],
                totalCandidatesExamined: 0,
                diagnostics: [{
                    code: 'AVAILABILITY_DEGRADED',
                    message: `Availability could not be determined: ${describeError(e)}`,
                }],
            };
        }
    }

    private async runValidation(name: string): Promise<ValidationResult> {
        try {
            return this.validator.validate(name);
        } catch (e) {
            if (e instanceof InternalDefectError) throw e;
            throw new InternalDefectError(`Naming rule evaluation failed: ${describeError(e)}`, e);
        }
    }
}

// Copies of the result objects and lists; the collaborators' own ones stay writable
const copyAvailability = (availability: AvailabilityResult): AvailabilityResult => ({
    ...availability,
    exactMatches: availability.exactMatches.map((m) => ({ ...m })),
    similarMatches: availability.similarMatches.map((m) => ({ ...m })),
    diagnostics: availability.diagnostics.map((d) => (d.detail ? { ...d, detail: { ...d.detail } } : { ...d })),
});

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const nested of Object.values(value)) deepFreeze(nested);
    }
    return value;
}

const toReported = (match: SimilarityMatch): ReportedCompany => ({
    company_name: match.displayName,
    identifier: match.identifier,
    similarity: match.similarity,
});

export function toReport(result: EngineResult): NameCheckReport {
    return {
        name: result.name,
        cleaned_name: result.normalizedKey,
        is_available: result.availability.available,
        existing_companies: result.availability.similarMatches.map(toReported),
        exact_matches: result.availability.exactMatches.map(toReported),
        total_candidates_examined: result.availability.totalCandidatesExamined,
        validation: {
            is_valid: result.validation.isValid,
            errors: [...result.validation.errors],
            warnings: [...result.validation.warnings],
            score: result.validation.score,
        },
        recommendation: result.recommendation,
        diagnostics: [...result.availability.diagnostics],
    };
}
