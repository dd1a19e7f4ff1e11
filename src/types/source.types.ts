/**
 * Source and Load Report Type Definitions
 */

export type SourceName = 'messages' | 'sessions' | 'sessionsWithChannel';

export type SourceStatus = 'loaded' | 'missing' | 'missing-column' | 'unreadable';

/**
 * Outcome of converting one raw row
 */
export type RowResult<T> =
    | { ok: true; value: T; notes: string[] }
    | { ok: false; reason: string };

/**
 * Per-source counters gathered while loading
 */
export type SourceReport = {
    source: SourceName;
    path: string | null;
    status: SourceStatus;
    rows: number;
    skipped: number;
    skipReasons: Record<string, number>;
    notes: Record<string, number>;
    warnings: string[];
};

/**
 * Everything the loader and joiner noticed about the inputs
 */
export type LoadReport = {
    sources: SourceReport[];
    danglingSessionRefs: number;
    danglingSessionIds: string[];
    duplicateSessions: number;
    warnings: string[];
};

export type TableLoadOptions = {
    encoding?: string;
    chunkSize?: number;
    delimiter?: string;
};
