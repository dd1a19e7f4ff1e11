import type { Message, TableLoadOptions } from '../types';
import { MESSAGE_COLUMNS, MESSAGE_REQUIRED_COLUMNS } from '../utils/constants';
import { normaliseMessageRow, type MessageField, type NormaliserOptions } from '../analysis/field-normaliser';
import { loadTable, parseTable, type TableLoadResult, type TableSchema } from './csv-table.parser';

// ============================================================================
// MESSAGES PARSER
// ============================================================================

export function messageSchema(options: NormaliserOptions = {}): TableSchema<MessageField, Message> {
    return {
        source: 'messages',
        columns: MESSAGE_COLUMNS,
        required: MESSAGE_REQUIRED_COLUMNS,
        convert: row => normaliseMessageRow(row, options)
    };
}

/**
 * Streams the messages export from disk
 */
export function loadMessages(
    filePath: string | null,
    options: NormaliserOptions & TableLoadOptions = {}
): Promise<TableLoadResult<Message>> {
    return loadTable(filePath, messageSchema(options), options);
}

/**
 * Parses a messages export already held in memory
 */
export function parseMessages(
    csvText: string,
    options: NormaliserOptions & TableLoadOptions = {}
): TableLoadResult<Message> {
    return parseTable(csvText, messageSchema(options), options);
}
