/**
 * File Utilities
 */

import fs from "fs";
import path from "path";
import * as iconv from 'iconv-lite';
import type { SourceName } from '../types';
import { DEFAULT_DELIMITER, DEFAULT_ENCODING, DEFAULT_SOURCE_FILES, MESSAGE_COLUMNS, SESSION_COLUMNS, SOURCE_NAMES } from './constants';
import { stripControlMarks } from './text.utils';

const SNIFF_BYTES = 4096;

// ============================================================================
// DECODING
// ============================================================================

/**
 * Checks that iconv-lite can decode the given encoding name
 */
export function isSupportedEncoding(encoding: string): boolean {
    return iconv.encodingExists(encoding);
}

// ============================================================================
// SOURCE DETECTION & DISCOVERY
// ============================================================================

/**
 * Splits the first line of a CSV file into trimmed header names.
 * Quoted headers are unquoted; embedded delimiters in headers are not supported.
 */
export function readHeader(filePath: string, encoding: string = DEFAULT_ENCODING, delimiter: string = DEFAULT_DELIMITER): string[] {
    const fd = fs.openSync(filePath, 'r');
    try {
        const buffer = Buffer.alloc(SNIFF_BYTES);
        const bytesRead = fs.readSync(fd, buffer, 0, SNIFF_BYTES, 0);
        const text = iconv.decode(buffer.subarray(0, bytesRead), encoding, { stripBOM: true });
        const firstLine = text.split(/\r?\n/, 1)[0] ?? '';
        return firstLine
            .split(delimiter)
            .map(cell => stripControlMarks(cell).trim().replace(/^"(.*)"$/, '$1'));
    } finally {
        fs.closeSync(fd);
    }
}

function hasAny(headers: Set<string>, names: readonly string[]): boolean {
    return names.some(name => headers.has(name));
}

/**
 * Detects which logical source a header row belongs to
 */
export function detectSourceKind(headers: string[]): SourceName | null {
    const set = new Set(headers);

    if (hasAny(set, MESSAGE_COLUMNS.messageId)) {
        return 'messages';
    }
    if (!hasAny(set, SESSION_COLUMNS.sessionId)) {
        return null;
    }
    if (hasAny(set, SESSION_COLUMNS.channel) || hasAny(set, SESSION_COLUMNS.pluginLabel)) {
        return 'sessionsWithChannel';
    }
    return 'sessions';
}

export type DiscoveryOptions = {
    encoding?: string;
    delimiter?: string;
    onUnreadable?: (filePath: string, error: unknown) => void;   // a file that could not be sniffed is skipped
};

/**
 * Locates the three sources in a data directory. Configured file names win;
 * any remaining source is matched by sniffing the header of the other CSV files
 * (first match in name order).
 */
export function discoverSourceFiles(
    directoryPath: string,
    fileNames: Record<SourceName, string> = DEFAULT_SOURCE_FILES,
    options: DiscoveryOptions = {}
): Record<SourceName, string | null> {
    const encoding = options.encoding ?? DEFAULT_ENCODING;
    const delimiter = options.delimiter ?? DEFAULT_DELIMITER;

    const found: Record<SourceName, string | null> = {
        messages: null,
        sessions: null,
        sessionsWithChannel: null
    };

    if (!fs.existsSync(directoryPath) || !fs.statSync(directoryPath).isDirectory()) {
        return found;
    }

    const claimed = new Set<string>();
    for (const source of SOURCE_NAMES) {
        const candidate = path.join(directoryPath, fileNames[source]);
        if (fs.existsSync(candidate)) {
            found[source] = candidate;
            claimed.add(candidate);
        }
    }

    const csvFiles = fs.readdirSync(directoryPath, { withFileTypes: true })
        .filter(item => item.isFile() && path.extname(item.name).toLowerCase() === '.csv')
        .map(item => path.join(directoryPath, item.name))
        .filter(file => !claimed.has(file))
        .sort();

    for (const file of csvFiles) {
        let headers: string[];
        try {
            headers = readHeader(file, encoding, delimiter);
        } catch (error) {
            options.onUnreadable?.(file, error);
            continue;
        }
        const kind = detectSourceKind(headers);
        if (kind && found[kind] === null) {
            found[kind] = file;
        }
    }

    return found;
}
