import type { Session, TableLoadOptions } from '../types';
import { SESSION_COLUMNS, SESSION_REQUIRED_COLUMNS } from '../utils/constants';
import { normaliseSessionRow, type NormaliserOptions, type SessionField } from '../analysis/field-normaliser';
import { loadTable, parseTable, type TableLoadResult, type TableSchema } from './csv-table.parser';

// ============================================================================
// SESSIONS PARSER
// ============================================================================

/**
 * Both session exports share one schema; the plain export simply lacks the
 * channel and plugin columns, which then read as null.
 */
export function sessionSchema(
    source: 'sessions' | 'sessionsWithChannel',
    options: NormaliserOptions = {}
): TableSchema<SessionField, Session> {
    return {
        source,
        columns: SESSION_COLUMNS,
        required: SESSION_REQUIRED_COLUMNS,
        convert: row => normaliseSessionRow(row, options)
    };
}

export function loadSessions(
    filePath: string | null,
    source: 'sessions' | 'sessionsWithChannel' = 'sessions',
    options: NormaliserOptions & TableLoadOptions = {}
): Promise<TableLoadResult<Session>> {
    return loadTable(filePath, sessionSchema(source, options), options);
}

export function parseSessions(
    csvText: string,
    source: 'sessions' | 'sessionsWithChannel' = 'sessions',
    options: NormaliserOptions & TableLoadOptions = {}
): TableLoadResult<Session> {
    return parseTable(csvText, sessionSchema(source, options), options);
}
