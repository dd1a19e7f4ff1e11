/**
 * Error Types
 */

export type AnalyticsErrorKind = 'missing-source' | 'malformed-row' | 'invalid-range' | 'insufficient-data' | 'invalid-option';

export class SupportAnalyticsError extends Error {
    readonly kind: AnalyticsErrorKind;

    constructor(kind: AnalyticsErrorKind, message: string) {
        super(message);
        this.name = 'SupportAnalyticsError';
        this.kind = kind;
    }
}

/**
 * Raised for a caller-supplied date filter that cannot be honoured
 */
export class InvalidRangeError extends SupportAnalyticsError {
    readonly start: string | undefined;
    readonly end: string | undefined;

    constructor(message: string, start?: string, end?: string) {
        super('invalid-range', message);
        this.name = 'InvalidRangeError';
        this.start = start;
        this.end = end;
    }
}

export function isInvalidRangeError(error: unknown): error is InvalidRangeError {
    return error instanceof InvalidRangeError;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
