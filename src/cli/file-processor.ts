import fs from "node:fs";
import path from "node:path";
import type { SourceName, SourceReport } from '../types';
import { SOURCE_NAMES } from '../utils/constants';
import { formatNumber } from '../utils/format.utils';
import { formatBytes } from './cli.utils';

// ============================================================================
// SOURCE SUMMARIES
// ============================================================================

const SOURCE_LABELS: Record<SourceName, string> = {
    messages: 'Messages',
    sessions: 'Sessions',
    sessionsWithChannel: 'Sessions (channel)'
};

/**
 * Table rows describing where each source was found
 */
export function describeDiscoveredSources(dataDir: string, files: Record<SourceName, string | null>): string[][] {
    return SOURCE_NAMES.map(source => {
        const file = files[source];
        if (file === null) {
            return [SOURCE_LABELS[source], 'not found', '-'];
        }
        return [SOURCE_LABELS[source], path.relative(dataDir, file), formatBytes(fs.statSync(file).size)];
    });
}

/**
 * Table rows with the load counters of each source
 */
export function describeLoadedSources(reports: readonly SourceReport[]): string[][] {
    return reports.map(report => {
        const reasons = Object.entries(report.skipReasons)
            .sort(([, a], [, b]) => b - a)
            .map(([reason, count]) => `${reason}: ${count}`)
            .join(', ');
        return [
            SOURCE_LABELS[report.source],
            report.status,
            formatNumber(report.rows),
            formatNumber(report.skipped),
            reasons || '-'
        ];
    });
}

/**
 * Every warning of the load, per source first
 */
export function collectWarnings(reports: readonly SourceReport[], extra: readonly string[]): string[] {
    return [...reports.flatMap(report => report.warnings), ...extra];
}
