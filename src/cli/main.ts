import fs from "node:fs";
import path from "node:path";
import type { DateRange } from '../types';
import { analyseSnapshot, runPipeline } from '../analysis/pipeline';
import { LexiconSentimentStrategy } from '../analysis/sentiment.classifier';
import { resolveRange } from '../analysis/range.filter';
import { DEFAULT_ENCODING, DEFAULT_SOURCE_FILES, DEFAULT_TIME_ZONE } from '../utils/constants';
import { describeError, isInvalidRangeError } from '../utils/errors';
import { discoverSourceFiles } from '../utils/file.utils';
import { formatDuration, formatHour, formatNumber, formatPercent, formatWeekdayHistogram } from '../utils/format.utils';
import {
    BANNER,
    colorize,
    createTable,
    formatBytes,
    LoadingSpinner,
    logError,
    logHeader,
    logInfo,
    logSuccess,
    logWarning,
    showError,
    showUsage
} from './cli.utils';
import { collectWarnings, describeDiscoveredSources, describeLoadedSources } from './file-processor';
import { buildReportDocument, getDefaultOutputPath, writeReport } from './output';

// ============================================================================
// ARGUMENTS
// ============================================================================

export type CliOptions = {
    dataDir: string;
    outputPath: string | null;
    range: DateRange;
    timeZone: string;
    encoding: string;
    lexiconPath: string | null;
};

export type ParsedArgs =
    | { kind: 'run'; options: CliOptions }
    | { kind: 'help' }
    | { kind: 'error'; message: string };

const VALUE_FLAGS = ['--from', '--to', '--tz', '--encoding', '--lexicon'] as const;
type ValueFlag = typeof VALUE_FLAGS[number];

function isValueFlag(arg: string): arg is ValueFlag {
    return VALUE_FLAGS.some(flag => flag === arg);
}

/**
 * Reads `<data_dir> [output.json]` plus flags. `argv` excludes the node binary
 * and script path.
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
    const positional: string[] = [];
    const values: Partial<Record<ValueFlag, string>> = {};

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--help' || arg === '-h') {
            return { kind: 'help' };
        }
        if (isValueFlag(arg)) {
            const value = argv[i + 1];
            if (value === undefined || value.startsWith('--')) {
                return { kind: 'error', message: `Missing value for ${arg}` };
            }
            values[arg] = value;
            i += 1;
            continue;
        }
        if (arg.startsWith('--')) {
            return { kind: 'error', message: `Unknown option ${arg}` };
        }
        positional.push(arg);
    }

    if (positional.length === 0) {
        return { kind: 'help' };
    }
    if (positional.length > 2) {
        return { kind: 'error', message: `Unexpected argument ${positional[2]}` };
    }

    return {
        kind: 'run',
        options: {
            dataDir: positional[0],
            outputPath: positional[1] ?? null,
            range: { start: values['--from'], end: values['--to'] },
            timeZone: values['--tz'] ?? DEFAULT_TIME_ZONE,
            encoding: values['--encoding'] ?? DEFAULT_ENCODING,
            lexiconPath: values['--lexicon'] ?? null
        }
    };
}

// ============================================================================
// CLI MAIN LOGIC
// ============================================================================

function orDash(value: number | undefined, format: (n: number) => string): string {
    return value === undefined ? '-' : format(value);
}

/**
 * Main CLI execution function. Returns the process exit code.
 */
export async function runCLI(args: string[]): Promise<number> {
    const parsed = parseCliArgs(args.slice(2));

    if (parsed.kind === 'help') {
        showUsage();
        return 0;
    }
    if (parsed.kind === 'error') {
        showError(parsed.message);
        return 1;
    }

    const { options } = parsed;
    const dataDir = path.resolve(options.dataDir);
    const outputPath = options.outputPath ? path.resolve(options.outputPath) : getDefaultOutputPath(dataDir);

    if (!fs.existsSync(dataDir) || !fs.statSync(dataDir).isDirectory()) {
        showError("Data directory does not exist", `Path: ${dataDir}`);
        return 1;
    }

    console.log(BANNER);

    try {
        // Fail on a bad range before reading anything
        resolveRange(options.range);

        // Step 1: Discover sources
        logHeader("DISCOVERING SOURCES");
        const files = discoverSourceFiles(dataDir, DEFAULT_SOURCE_FILES, {
            encoding: options.encoding,
            onUnreadable: (file, error) => logWarning(`Skipped unreadable file ${path.basename(file)}: ${describeError(error)}`)
        });
        createTable(
            [
                { header: 'Source', width: 20, align: 'left' },
                { header: 'File', width: 36, align: 'left' },
                { header: 'Size', width: 10, align: 'right' }
            ],
            describeDiscoveredSources(dataDir, files)
        );

        // Step 2: Load
        logHeader("LOADING EXPORTS");
        const spinner = new LoadingSpinner("Streaming and normalising rows...");
        spinner.start();
        const snapshot = await runPipeline({
            paths: files,
            encoding: options.encoding,
            timeZone: options.timeZone
        }).finally(() => spinner.stop());

        createTable(
            [
                { header: 'Source', width: 20, align: 'left' },
                { header: 'Status', width: 14, align: 'left' },
                { header: 'Rows', width: 10, align: 'right' },
                { header: 'Skipped', width: 8, align: 'right' },
                { header: 'Skip reasons', width: 36, align: 'left' }
            ],
            describeLoadedSources(snapshot.report.sources)
        );

        for (const warning of collectWarnings(snapshot.report.sources, snapshot.report.warnings)) {
            logWarning(warning);
        }
        logSuccess(`Loaded ${formatNumber(snapshot.messages.length)} messages, ${formatNumber(snapshot.sessions.length)} sessions, ${formatNumber(snapshot.contacts.length)} contacts`);

        // Step 3: Analyse
        logHeader("COMPUTING METRICS");
        const strategy = options.lexiconPath
            ? LexiconSentimentStrategy.fromFile(path.resolve(options.lexiconPath))
            : LexiconSentimentStrategy.fromFile();
        const analysis = analyseSnapshot(snapshot, options.range, { strategy });
        logSuccess("Analysis computation complete");

        createTable(
            [
                { header: 'Operator', width: 20, align: 'left' },
                { header: 'Sessions', width: 8, align: 'right' },
                { header: 'Rating', width: 6, align: 'right' },
                { header: 'Avg handle', width: 10, align: 'right' },
                { header: 'Sess/hour', width: 9, align: 'right' },
                { header: 'Satisfied', width: 9, align: 'right' }
            ],
            analysis.scorecards.operators.slice(0, 15).map(card => [
                card.operatorId,
                formatNumber(card.sessionCount),
                orDash(card.averageRating, n => n.toFixed(2)),
                orDash(card.averageHandleTimeSec, formatDuration),
                orDash(card.sessionsPerHour, n => n.toFixed(2)),
                orDash(card.satisfactionRate, formatPercent)
            ])
        );
        if (analysis.scorecards.unassigned.sessionCount > 0) {
            logInfo(`${formatNumber(analysis.scorecards.unassigned.sessionCount)} session(s) without an operator`);
        }

        createTable(
            [
                { header: 'Weekday', width: 10, align: 'left' },
                { header: 'Messages', width: 10, align: 'right' },
                { header: 'Share', width: 7, align: 'right' }
            ],
            formatWeekdayHistogram(analysis.volume.weekdayHistogram).map(bin => [
                bin.day,
                formatNumber(bin.count),
                formatPercent(bin.percentage / 100)
            ])
        );
        if (analysis.volume.peakHours.length > 0) {
            logInfo(`Peak hours: ${analysis.volume.peakHours.map(formatHour).join(', ')}`);
        }

        // Step 4: Write report
        logHeader("WRITING REPORT");
        const size = writeReport(outputPath, buildReportDocument(snapshot.report, analysis, snapshot.timeZone));
        logSuccess(`JSON report written: ${path.basename(outputPath)} (${formatBytes(size)})`);

        // Final summary
        logHeader("INSIGHTS");
        for (const line of analysis.headlines) {
            console.log(`  ${colorize('•', 'cyan')} ${line}`);
        }
        console.log();
        console.log(`${colorize('Output:', 'bright')} ${outputPath}`);
        return 0;
    } catch (error) {
        if (isInvalidRangeError(error)) {
            logError(`Invalid date range: ${error.message}`);
        } else {
            logError("Error analysing support exports");
            console.log(`${colorize('Details:', 'dim')} ${describeError(error)}`);
        }
        return 1;
    }
}
