export * from './csv-table.parser';
export * from './messages.parser';
export * from './sessions.parser';
export * from './session-merger';
