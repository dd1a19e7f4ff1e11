/**
 * Closure, Channel, Rating and Overview Breakdowns
 */

import type {
    BreakdownMetrics,
    ClosureEntry,
    ClosureMetrics,
    DateRange,
    Message,
    MessageChannelEntry,
    OverviewMetrics,
    RatingCategory,
    RatingMetrics,
    Session,
    ShareEntry
} from '../types';
import { DURATION_BUCKETS, UNKNOWN } from '../utils/constants';
import { increment, mean, present, toRecord, zeroCounter } from '../utils/stats.utils';
import { filterMessages, filterSessions } from './range.filter';

function percentage(count: number, total: number): number {
    return total > 0 ? (count / total) * 100 : 0;
}

function byCountThenKey<T extends { count: number }>(key: (item: T) => string) {
    return (a: T, b: T): number => b.count - a.count || key(a).localeCompare(key(b));
}

// ============================================================================
// CLOSURE REASONS
// ============================================================================

/**
 * Count and share of sessions per closure reason. `unknown` is always listed,
 * even at zero, so unclassified closures are never hidden.
 */
export function computeClosureBreakdown(sessions: readonly Session[], range?: DateRange): ClosureMetrics {
    const selected = filterSessions(sessions, range);
    const grouped = new Map<string, Session[]>([[UNKNOWN, []]]);

    for (const session of selected) {
        const list = grouped.get(session.closureReason);
        if (list) {
            list.push(session);
        } else {
            grouped.set(session.closureReason, [session]);
        }
    }

    const reasons: ClosureEntry[] = Array.from(grouped.entries())
        .map(([reason, list]) => ({
            reason,
            count: list.length,
            percentage: percentage(list.length, selected.length),
            averageDurationSec: mean(present(list.map(s => s.totalDurationSec))),
            averageMessages: mean(present(list.map(s => s.messageCount))),
            averageRating: mean(present(list.map(s => s.rating)))
        }))
        .sort(byCountThenKey(entry => entry.reason));

    const byReason = toRecord(reasons.map(entry => [entry.reason, entry] as const));

    return { totalSessions: selected.length, reasons, byReason };
}

// ============================================================================
// CHANNELS & TYPES
// ============================================================================

/**
 * Share of sessions per plugin connection label, largest first.
 * Sessions without a label are left out.
 */
export function computePluginShares(sessions: readonly Session[]): ShareEntry[] {
    const counts = zeroCounter();
    let total = 0;
    for (const session of sessions) {
        if (session.pluginLabel === null) continue;
        increment(counts, session.pluginLabel);
        total += 1;
    }

    return Array.from(counts.entries())
        .map(([key, count]) => ({ key, count, percentage: percentage(count, total) }))
        .sort(byCountThenKey(entry => entry.key));
}

/**
 * Messages, unique sessions and unique contacts per message channel
 */
export function computeMessageChannels(messages: readonly Message[]): MessageChannelEntry[] {
    const acc = new Map<string, { messages: number; sessions: Set<string>; contacts: Set<string> }>();

    for (const m of messages) {
        if (m.channel === null) continue;
        let entry = acc.get(m.channel);
        if (!entry) {
            entry = { messages: 0, sessions: new Set(), contacts: new Set() };
            acc.set(m.channel, entry);
        }
        entry.messages += 1;
        entry.sessions.add(m.sessionId);
        entry.contacts.add(m.contactId);
    }

    return Array.from(acc.entries())
        .map(([channel, entry]) => ({
            channel,
            messages: entry.messages,
            uniqueSessions: entry.sessions.size,
            uniqueContacts: entry.contacts.size,
            messagesPerSession: entry.messages / entry.sessions.size
        }))
        .sort((a, b) => b.messages - a.messages || a.channel.localeCompare(b.channel));
}

export function computeChannelBreakdown(
    messages: readonly Message[],
    sessions: readonly Session[],
    range?: DateRange
): BreakdownMetrics {
    const selectedMessages = filterMessages(messages, range);
    const selectedSessions = filterSessions(sessions, range);

    const messagesByType = zeroCounter(['text', 'file', 'event', UNKNOWN]);
    for (const m of selectedMessages) {
        increment(messagesByType, m.type);
    }

    const sessionsByChannel = zeroCounter();
    for (const s of selectedSessions) {
        increment(sessionsByChannel, s.channel ?? UNKNOWN);
    }

    return {
        messagesByType: toRecord(messagesByType),
        sessionsByChannel: toRecord(sessionsByChannel),
        sessionsByPlugin: computePluginShares(selectedSessions),
        messageChannels: computeMessageChannels(selectedMessages)
    };
}

// ============================================================================
// RATINGS
// ============================================================================

/**
 * poor: up to 2 stars, fair: up to 3, good: up to 4, excellent: above 4
 */
export function categoriseRating(rating: number): RatingCategory {
    if (rating <= 2) return 'poor';
    if (rating <= 3) return 'fair';
    if (rating <= 4) return 'good';
    return 'excellent';
}

export function computeRatingBreakdown(sessions: readonly Session[], range?: DateRange): RatingMetrics {
    const selected = filterSessions(sessions, range);
    const ratings = present(selected.map(s => s.rating));

    const byStars = zeroCounter(['1', '2', '3', '4', '5']);
    const byCategory: Record<RatingCategory, number> = { poor: 0, fair: 0, good: 0, excellent: 0 };
    for (const rating of ratings) {
        increment(byStars, String(Math.round(rating)));
        byCategory[categoriseRating(rating)] += 1;
    }

    const byDurationBucket = DURATION_BUCKETS.map(bucket => {
        const inBucket = selected.filter(s =>
            s.totalDurationSec !== null &&
            s.totalDurationSec >= bucket.minSec &&
            (bucket.maxSec === null || s.totalDurationSec < bucket.maxSec)
        );
        return {
            label: bucket.label,
            count: inBucket.length,
            averageRating: mean(present(inBucket.map(s => s.rating)))
        };
    });

    return {
        ratedSessions: ratings.length,
        unratedSessions: selected.length - ratings.length,
        averageRating: mean(ratings),
        byStars: toRecord(byStars),
        byCategory,
        byDurationBucket
    };
}

// ============================================================================
// OVERVIEW
// ============================================================================

/**
 * Headline counts and averages for the selected range
 */
export function computeOverview(
    messages: readonly Message[],
    sessions: readonly Session[],
    range?: DateRange
): OverviewMetrics {
    const selectedMessages = filterMessages(messages, range);
    const selectedSessions = filterSessions(sessions, range);

    let first: Date | undefined;
    let last: Date | undefined;
    let inbound = 0;
    let outbound = 0;
    for (const m of selectedMessages) {
        if (m.direction === 'inbound') inbound += 1;
        if (m.direction === 'outbound') outbound += 1;
        if (!first || m.createdAt < first) first = m.createdAt;
        if (!last || m.createdAt > last) last = m.createdAt;
    }

    const operators = new Set(
        selectedSessions.map(s => s.operatorId).filter((id): id is string => id !== null)
    );

    return {
        messages: selectedMessages.length,
        inbound,
        outbound,
        uniqueContacts: new Set(selectedMessages.map(m => m.contactId)).size,
        uniqueMessageSessions: new Set(selectedMessages.map(m => m.sessionId)).size,
        sessions: selectedSessions.length,
        operators: operators.size,
        averageDurationSec: mean(present(selectedSessions.map(s => s.totalDurationSec))),
        averageQueueSec: mean(present(selectedSessions.map(s => s.queueDurationSec))),
        averageRating: mean(present(selectedSessions.map(s => s.rating))),
        firstMessageAt: first?.toISOString(),
        lastMessageAt: last?.toISOString()
    };
}
