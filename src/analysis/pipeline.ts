/**
 * Analytics Pipeline
 *
 * Loads the three exports, merges and joins them into one frozen snapshot,
 * then runs every metric, the classifier and the summariser for a range.
 */

import path from "node:path";
import type {
    AnalysisReport,
    AnalyticsSnapshot,
    DateRange,
    LoadReport,
    Message,
    Session,
    SourceName,
    SourceReport
} from '../types';
import type { TableLoadResult } from '../parsers/csv-table.parser';
import { loadMessages } from '../parsers/messages.parser';
import { loadSessions } from '../parsers/sessions.parser';
import { mergeSessionSources } from '../parsers/session-merger';
import {
    DEFAULT_CHUNK_SIZE,
    DEFAULT_ENCODING,
    DEFAULT_SOURCE_FILES,
    DEFAULT_TIME_ZONE
} from '../utils/constants';
import { describeError, SupportAnalyticsError } from '../utils/errors';
import { discoverSourceFiles, isSupportedEncoding } from '../utils/file.utils';
import { isValidTimeZone } from '../utils/date.utils';
import { computeChannelBreakdown, computeClosureBreakdown, computeOverview, computeRatingBreakdown } from './breakdown.computer';
import { joinEntities } from './entity.joiner';
import { formatInsights, summariseInsights, type InsightOptions } from './insight.summariser';
import { computeLatency } from './latency.computer';
import { computeLoyaltyDistribution } from './loyalty.classifier';
import { computeScorecards, type ScorecardOptions } from './operator.computer';
import { filterMessages, resolveRange } from './range.filter';
import { computeSentiment, LexiconSentimentStrategy, type SentimentStrategy } from './sentiment.classifier';
import { computeVolume } from './volume.computer';

export type PipelineOptions = {
    dataDir?: string;
    paths?: Partial<Record<SourceName, string | null>>;   // explicit files override discovery
    fileNames?: Record<SourceName, string>;
    encoding?: string;
    chunkSize?: number;
    delimiter?: string;
    timeZone?: string;
    closureReasons?: readonly string[];
};

export type AnalysisOptions = ScorecardOptions & InsightOptions & {
    strategy?: SentimentStrategy;
};

// ============================================================================
// SNAPSHOT
// ============================================================================

function freezeAll<T extends object>(items: T[]): readonly T[] {
    for (const item of items) Object.freeze(item);
    return Object.freeze(items);
}

export type SnapshotTables = {
    messages: TableLoadResult<Message>;
    sessions: TableLoadResult<Session>;
    sessionsWithChannel: TableLoadResult<Session>;
    discoveryWarnings?: readonly string[];
};

/**
 * Merges the session sources, joins messages to sessions and contacts and
 * freezes the result
 */
export function buildSnapshot(tables: SnapshotTables, timeZone: string = DEFAULT_TIME_ZONE): AnalyticsSnapshot {
    const merged = mergeSessionSources(tables.sessions.rows, tables.sessionsWithChannel.rows);
    const messages = tables.messages.rows;
    const joined = joinEntities(messages, merged.sessions);

    const sources: SourceReport[] = [tables.messages.report, tables.sessions.report, tables.sessionsWithChannel.report];
    const warnings: string[] = [...(tables.discoveryWarnings ?? [])];
    if (joined.dangling.messages > 0) {
        const examples = joined.dangling.sessionIds.slice(0, 3).join(', ');
        warnings.push(`${joined.dangling.messages} message(s) reference unknown sessions (e.g. ${examples})`);
    }
    if (merged.duplicates > 0) {
        warnings.push(`${merged.duplicates} duplicate session row(s) ignored`);
    }

    const report: LoadReport = {
        sources,
        danglingSessionRefs: joined.dangling.messages,
        danglingSessionIds: joined.dangling.sessionIds,
        duplicateSessions: merged.duplicates,
        warnings
    };

    const sessionMessages = new Map<string, readonly Message[]>();
    for (const [sessionId, list] of joined.sessionMessages) {
        sessionMessages.set(sessionId, Object.freeze(list));
    }

    return Object.freeze({
        messages: freezeAll(messages),
        sessions: freezeAll(merged.sessions),
        contacts: freezeAll(joined.contacts),
        sessionMessages,
        report: Object.freeze(report),
        timeZone
    });
}

/**
 * Locates and streams the three sources. A missing or unreadable source yields
 * an empty table and a warning; only an unknown encoding or time zone throws.
 */
export async function runPipeline(options: PipelineOptions = {}): Promise<AnalyticsSnapshot> {
    const encoding = options.encoding ?? DEFAULT_ENCODING;
    const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;

    if (!isSupportedEncoding(encoding)) {
        throw new SupportAnalyticsError('invalid-option', `Unsupported encoding "${encoding}"`);
    }
    if (!isValidTimeZone(timeZone)) {
        throw new SupportAnalyticsError('invalid-option', `Unknown time zone "${timeZone}"`);
    }

    const discoveryWarnings: string[] = [];
    const discovered: Record<SourceName, string | null> = options.dataDir
        ? discoverSourceFiles(path.resolve(options.dataDir), options.fileNames ?? DEFAULT_SOURCE_FILES, {
            encoding,
            delimiter: options.delimiter,
            onUnreadable: (file, error) => {
                discoveryWarnings.push(`Skipped unreadable file ${path.basename(file)}: ${describeError(error)}`);
            }
        })
        : { messages: null, sessions: null, sessionsWithChannel: null };
    const files = { ...discovered, ...options.paths };

    const loadOptions = {
        encoding,
        timeZone,
        chunkSize: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
        delimiter: options.delimiter,
        closureReasons: options.closureReasons
    };

    const [messages, sessions, sessionsWithChannel] = await Promise.all([
        loadMessages(files.messages ?? null, loadOptions),
        loadSessions(files.sessions ?? null, 'sessions', loadOptions),
        loadSessions(files.sessionsWithChannel ?? null, 'sessionsWithChannel', loadOptions)
    ]);

    return buildSnapshot({ messages, sessions, sessionsWithChannel, discoveryWarnings }, timeZone);
}

// ============================================================================
// ANALYSIS
// ============================================================================

/**
 * Runs every aggregation for one range over a snapshot. Contacts for the
 * loyalty figures are those with a message in range.
 *
 * @throws InvalidRangeError when the range is malformed or reversed
 */
export function analyseSnapshot(
    snapshot: AnalyticsSnapshot,
    range: DateRange = {},
    options: AnalysisOptions = {}
): AnalysisReport {
    const resolved = resolveRange(range);
    const strategy = options.strategy ?? LexiconSentimentStrategy.fromFile();

    const volume = computeVolume(snapshot.messages, range);
    const scorecards = computeScorecards(snapshot.sessions, range, options);
    const sentiment = computeSentiment(snapshot.messages, strategy, range);

    const activeContacts = new Set(filterMessages(snapshot.messages, range).map(m => m.contactId));
    const loyalty = computeLoyaltyDistribution(snapshot.contacts.filter(c => activeContacts.has(c.contactId)));

    const insights = summariseInsights(
        { scorecards, volume, sentiment, loyalty, report: snapshot.report },
        options
    );

    return {
        range: resolved,
        overview: computeOverview(snapshot.messages, snapshot.sessions, range),
        volume,
        scorecards,
        latency: computeLatency(snapshot.sessions, range),
        closures: computeClosureBreakdown(snapshot.sessions, range),
        breakdown: computeChannelBreakdown(snapshot.messages, snapshot.sessions, range),
        ratings: computeRatingBreakdown(snapshot.sessions, range),
        sentiment,
        loyalty,
        insights,
        headlines: formatInsights(insights)
    };
}
