/**
 * 🚨 ERROR TAXONOMY
 * Standardized error classes for the name-check engine.
 *
 * Input shape problems are NOT errors here: they surface as validation messages.
 */

export type ErrorCode = 'DATA_SOURCE_UNAVAILABLE' | 'INTERNAL_DEFECT' | 'CONFIG_ERROR';

export class NameCheckError extends Error {
    constructor(message: string, public readonly code: ErrorCode, public readonly context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Registry unreachable, timed out or answered something we cannot read.
 * Recovered fail-open by the conflict search and the engine.
 */
export class DataSourceUnavailableError extends NameCheckError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'DATA_SOURCE_UNAVAILABLE', context);
    }
}

/**
 * A failure inside pure, offline logic (validator, scorer, normalizer). Never recovered.
 */
export class InternalDefectError extends NameCheckError {
    constructor(message: string, public readonly underlying?: unknown) {
        super(message, 'INTERNAL_DEFECT', { fatal: true });
    }
}

export class ConfigurationError extends NameCheckError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', { fatal: true });
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
