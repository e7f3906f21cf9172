export type RegistryEntry = {
    displayName: string;
    identifier: string; // CIN for MCA records, opaque otherwise
    status?: string;
    incorporatedOn?: string;
    source?: string;
};

export type SimilarityMatch = RegistryEntry & {
    similarity: number; // 0..100 against the query key
};

export type DiagnosticCode = 'DATA_SOURCE_UNAVAILABLE' | 'DATA_SOURCE_PARTIAL' | 'AVAILABILITY_DEGRADED';

export type Diagnostic = {
    code: DiagnosticCode;
    message: string;
    detail?: Record<string, unknown>;
};

export type AvailabilityResult = {
    available: boolean;
    exactMatches: SimilarityMatch[];
    similarMatches: SimilarityMatch[];
    totalCandidatesExamined: number;
    diagnostics: Diagnostic[];
};

export type ValidationResult = {
    isValid: boolean;
    errors: string[];
    warnings: string[];
    score: number;
};

export type EngineResult = Readonly<{
    name: string;
    normalizedKey: string;
    availability: AvailabilityResult;
    validation: ValidationResult;
    recommendation: string;
}>;

export type ReportedCompany = {
    company_name: string;
    identifier: string;
    similarity: number;
};

// Wire shape consumed by the presentation layer
export type NameCheckReport = {
    name: string;
    cleaned_name: string;
    is_available: boolean;
    existing_companies: ReportedCompany[];
    exact_matches: ReportedCompany[];
    total_candidates_examined: number;
    validation: {
        is_valid: boolean;
        errors: string[];
        warnings: string[];
        score: number;
    };
    recommendation: string;
    diagnostics: Diagnostic[];
};

export type CompanyProfile = {
    entry: RegistryEntry;
    raw: Record<string, unknown>;
};
