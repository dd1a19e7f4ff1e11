/**
 * Operator Scorecard Computation
 */

import type {
    DateRange,
    OperatorScorecard,
    ScorecardMetrics,
    Session,
    UnassignedBucket
} from '../types';
import { DEFAULT_SATISFACTION_THRESHOLD } from '../utils/constants';
import { mean, median, present, sum, toRecord } from '../utils/stats.utils';
import { filterSessions } from './range.filter';

export type ScorecardOptions = {
    satisfactionThreshold?: number;     // ratings at or above count as satisfied
};

/**
 * Builds one scorecard from an operator's sessions. Ratings, durations and
 * message counts are averaged only over sessions that carry them; sessions
 * with no positive total duration stay out of the efficiency figure.
 */
export function buildScorecard(
    operatorId: string,
    sessions: readonly Session[],
    options: ScorecardOptions = {}
): OperatorScorecard {
    const threshold = options.satisfactionThreshold ?? DEFAULT_SATISFACTION_THRESHOLD;

    const ratings = present(sessions.map(s => s.rating));
    const durations = present(sessions.map(s => s.totalDurationSec));
    const messageCounts = present(sessions.map(s => s.messageCount));

    const eligible = sessions.filter(s => s.handleEfficiency !== undefined);
    const handleHours = sum(present(eligible.map(s => s.totalDurationSec))) / 3600;

    return {
        operatorId,
        sessionCount: sessions.length,
        ratedSessions: ratings.length,
        averageRating: mean(ratings),
        averageHandleTimeSec: mean(present(sessions.map(s => s.manualDurationSec))),
        averageDurationSec: mean(durations),
        medianDurationSec: median(durations),
        averageQueueSec: mean(present(sessions.map(s => s.queueDurationSec))),
        totalMessages: sum(messageCounts),
        averageMessagesPerSession: mean(messageCounts),
        timedSessions: eligible.length,
        handleHours,
        sessionsPerHour: eligible.length > 0 && handleHours > 0 ? eligible.length / handleHours : undefined,
        satisfactionRate: ratings.length > 0
            ? ratings.filter(r => r >= threshold).length / ratings.length
            : undefined
    };
}

/**
 * Per-operator scorecards, busiest first (ties by id). Sessions without an
 * operator are only counted in the unassigned bucket.
 */
export function computeScorecards(
    sessions: readonly Session[],
    range?: DateRange,
    options: ScorecardOptions = {}
): ScorecardMetrics {
    const selected = filterSessions(sessions, range);

    const grouped = new Map<string, Session[]>();
    const unassigned: Session[] = [];

    for (const session of selected) {
        if (session.operatorId === null) {
            unassigned.push(session);
            continue;
        }
        const list = grouped.get(session.operatorId);
        if (list) {
            list.push(session);
        } else {
            grouped.set(session.operatorId, [session]);
        }
    }

    const operators = Array.from(grouped.entries())
        .map(([operatorId, list]) => buildScorecard(operatorId, list, options))
        .sort((a, b) => b.sessionCount - a.sessionCount || a.operatorId.localeCompare(b.operatorId));

    const byOperator = toRecord(operators.map(card => [card.operatorId, card] as const));

    const unassignedRatings = present(unassigned.map(s => s.rating));
    const unassignedBucket: UnassignedBucket = {
        sessionCount: unassigned.length,
        ratedSessions: unassignedRatings.length,
        averageRating: mean(unassignedRatings)
    };

    return { operators, byOperator, unassigned: unassignedBucket };
}
