export { Normalizer } from './modules/normalizer';
export { SimilarityScorer } from './modules/scorer';
export { ConflictSearch } from './modules/conflict-search';
export type { ConflictSearchOptions } from './modules/conflict-search';
export { ConventionValidator } from './modules/validator';
export { Recommender } from './modules/recommender';
export { NameCheckEngine, toReport } from './modules/engine';
export type { AvailabilityChecker, EngineOptions, NameValidator } from './modules/engine';
export * from './modules/registry';
export { loadRules, parseRules, readRulesFile } from './config';
export type { Rules } from './config';
export { loadSettings } from './config/env';
export type { Settings } from './config/env';
export * from './utils/errors';
export type {
    AvailabilityResult,
    CompanyProfile,
    Diagnostic,
    DiagnosticCode,
    EngineResult,
    NameCheckReport,
    RegistryEntry,
    ReportedCompany,
    SimilarityMatch,
    ValidationResult,
} from './types';
