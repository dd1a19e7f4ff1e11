import fs from "node:fs";
import { pipeline } from "node:stream/promises";
import { parse, type Options as CsvOptions } from 'csv-parse';
import { parse as parseSync } from 'csv-parse/sync';
import * as iconv from 'iconv-lite';
import type { RowResult, SourceName, SourceReport, TableLoadOptions } from '../types';
import { DEFAULT_CHUNK_SIZE, DEFAULT_DELIMITER, DEFAULT_ENCODING } from '../utils/constants';
import { describeError } from '../utils/errors';
import { stripControlMarks } from '../utils/text.utils';

// ============================================================================
// TABLE SCHEMA
// ============================================================================

/**
 * Raw cell values keyed by canonical field name. A field is undefined when
 * its column is absent from the file.
 */
export type FieldRow<F extends string> = Partial<Record<F, string>>;

export type TableSchema<F extends string, T> = {
    source: SourceName;
    columns: Record<F, readonly string[]>;
    required: readonly F[];
    convert: (row: FieldRow<F>) => RowResult<T>;
};

export type TableLoadResult<T> = {
    rows: T[];
    report: SourceReport;
};

function emptyReport(source: SourceName, filePath: string | null): SourceReport {
    return {
        source,
        path: filePath,
        status: 'loaded',
        rows: 0,
        skipped: 0,
        skipReasons: {},
        notes: {},
        warnings: []
    };
}

function bump(counter: Record<string, number>, key: string): void {
    counter[key] = (counter[key] ?? 0) + 1;
}

// ============================================================================
// ROW ACCUMULATION
// ============================================================================

/**
 * Consumes CSV records one at a time: the first record is the header, every
 * later record is resolved by column name and handed to the schema converter.
 */
export class TableBuilder<F extends string, T> {
    private readonly schema: TableSchema<F, T>;
    private readonly report: SourceReport;
    private readonly rows: T[] = [];
    private columnIndex: Map<F, number> | null = null;
    private headerWidth = 0;
    private rejected = false;

    constructor(schema: TableSchema<F, T>, filePath: string | null) {
        this.schema = schema;
        this.report = emptyReport(schema.source, filePath);
    }

    push(record: string[]): void {
        if (this.rejected) return;

        if (this.columnIndex === null) {
            this.readHeader(record);
            return;
        }

        if (record.length !== this.headerWidth) {
            this.skip('column-count');
            return;
        }

        const fields: FieldRow<F> = {};
        for (const [field, index] of this.columnIndex) {
            fields[field] = record[index];
        }

        const result = this.schema.convert(fields);
        if (result.ok) {
            this.rows.push(result.value);
            this.report.rows += 1;
            for (const note of result.notes) {
                bump(this.report.notes, note);
            }
        } else {
            this.skip(result.reason);
        }
    }

    fail(message: string): void {
        this.report.status = 'unreadable';
        this.report.warnings.push(message);
    }

    finish(): TableLoadResult<T> {
        if (this.columnIndex === null && !this.rejected && this.report.status === 'loaded') {
            this.report.warnings.push(`${this.schema.source}: file is empty`);
        }
        return { rows: this.rows, report: this.report };
    }

    private fieldNames(): F[] {
        return Object.keys(this.schema.columns).filter((key): key is F => key in this.schema.columns);
    }

    private readHeader(record: string[]): void {
        const header = record.map(cell => stripControlMarks(cell).trim());
        const positions = new Map<string, number>();
        header.forEach((name, index) => {
            if (!positions.has(name)) positions.set(name, index);
        });

        const index = new Map<F, number>();
        for (const field of this.fieldNames()) {
            for (const alias of this.schema.columns[field]) {
                const position = positions.get(alias);
                if (position !== undefined) {
                    index.set(field, position);
                    break;
                }
            }
        }

        const missing = this.schema.required.filter(field => !index.has(field));
        if (missing.length > 0) {
            this.rejected = true;
            this.report.status = 'missing-column';
            this.report.warnings.push(
                `${this.schema.source}: required column(s) missing: ${missing.map(f => this.schema.columns[f][0]).join(', ')}`
            );
            return;
        }

        this.columnIndex = index;
        this.headerWidth = header.length;
    }

    private skip(reason: string): void {
        this.report.skipped += 1;
        bump(this.report.skipReasons, reason);
    }
}

// ============================================================================
// LOADING
// ============================================================================

function csvOptions(options: TableLoadOptions): CsvOptions {
    return {
        delimiter: options.delimiter ?? DEFAULT_DELIMITER,
        bom: true,
        relax_column_count: true,
        relax_quotes: true,
        skip_empty_lines: true
    };
}

function toRecord(value: unknown): string[] | null {
    if (!Array.isArray(value)) return null;
    return value.map(cell => (typeof cell === 'string' ? cell : String(cell)));
}

/**
 * Returns the report of a source whose file is not there
 */
export function missingSourceReport(source: SourceName, filePath: string | null): SourceReport {
    const report = emptyReport(source, filePath);
    report.status = 'missing';
    report.warnings.push(filePath ? `${source}: file not found: ${filePath}` : `${source}: no file supplied`);
    return report;
}

/**
 * Streams a CSV file through the decoder and parser in bounded chunks
 * (`chunkSize` bytes per read). Rows are converted as they arrive, so the raw
 * text is never held in memory as a whole.
 */
export async function loadTable<F extends string, T>(
    filePath: string | null,
    schema: TableSchema<F, T>,
    options: TableLoadOptions = {}
): Promise<TableLoadResult<T>> {
    if (!filePath || !fs.existsSync(filePath)) {
        return { rows: [], report: missingSourceReport(schema.source, filePath) };
    }

    const encoding = options.encoding ?? DEFAULT_ENCODING;
    const builder = new TableBuilder(schema, filePath);

    try {
        await pipeline(
            fs.createReadStream(filePath, { highWaterMark: options.chunkSize ?? DEFAULT_CHUNK_SIZE }),
            iconv.decodeStream(encoding, { stripBOM: true }),
            parse(csvOptions(options)),
            async function (records: AsyncIterable<unknown>) {
                for await (const value of records) {
                    const record = toRecord(value);
                    if (record) builder.push(record);
                }
            }
        );
    } catch (error) {
        builder.fail(`${schema.source}: could not read ${filePath}: ${describeError(error)}`);
    }

    return builder.finish();
}

/**
 * Parses CSV text already held in memory
 */
export function parseTable<F extends string, T>(
    text: string,
    schema: TableSchema<F, T>,
    options: TableLoadOptions = {},
    label: string | null = null
): TableLoadResult<T> {
    const builder = new TableBuilder(schema, label);

    try {
        const parsed: unknown = parseSync(text, csvOptions(options));
        if (Array.isArray(parsed)) {
            for (const value of parsed) {
                const record = toRecord(value);
                if (record) builder.push(record);
            }
        }
    } catch (error) {
        builder.fail(`${schema.source}: could not parse ${label ?? 'input'}: ${describeError(error)}`);
    }

    return builder.finish();
}
