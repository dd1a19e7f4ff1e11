import { describe, expect, it } from 'vitest';
import {
    categoriseRating,
    computeChannelBreakdown,
    computeClosureBreakdown,
    computeOverview,
    computeRatingBreakdown
} from '../src/analysis/breakdown.computer';
import { buildContacts, buildSessionIndex, findDanglingReferences } from '../src/analysis/entity.joiner';
import { computeLatency, summariseDistribution } from '../src/analysis/latency.computer';
import { assignLoyaltyTier, computeLoyaltyDistribution } from '../src/analysis/loyalty.classifier';
import { computeScorecards } from '../src/analysis/operator.computer';
import { filterSessions, resolveRange } from '../src/analysis/range.filter';
import { computeVolume, findPeakHours } from '../src/analysis/volume.computer';
import { InvalidRangeError } from '../src/utils/errors';
import { makeMessage, makeSession } from './helpers';

const MESSAGES = [
    makeMessage({ messageId: 'm1', sessionId: 's1', contactId: 'c1', createdAt: new Date('2025-07-20T10:00:00Z') }),
    makeMessage({ messageId: 'm2', sessionId: 's1', contactId: 'c1', direction: 'outbound', createdAt: new Date('2025-07-20T10:05:00Z') }),
    makeMessage({ messageId: 'm3', sessionId: 's2', contactId: 'c2', createdAt: new Date('2025-07-21T14:00:00Z') }),
    makeMessage({ messageId: 'm4', sessionId: 's2', contactId: 'c2', direction: 'unknown', createdAt: new Date('2025-07-23T09:30:00Z') })
];

describe('range filtering', () => {
    it('rejects a start after the end', () => {
        expect(() => resolveRange({ start: '2025-07-21', end: '2025-07-20' })).toThrow(InvalidRangeError);
    });

    it('rejects malformed bounds', () => {
        expect(() => resolveRange({ start: '2025-13-01' })).toThrow('Invalid start date "2025-13-01" (expected YYYY-MM-DD)');
    });

    it('surfaces a reversed range from every aggregation', () => {
        const range = { start: '2025-07-22', end: '2025-07-01' };
        expect(() => computeVolume(MESSAGES, range)).toThrow(InvalidRangeError);
        expect(() => computeScorecards([makeSession()], range)).toThrow(InvalidRangeError);
    });

    it('excludes sessions without an opening date from a bounded range', () => {
        const sessions = [makeSession({ sessionId: 'a' }), makeSession({ sessionId: 'b', date: null })];

        expect(filterSessions(sessions, { start: '2025-07-01' }).map(s => s.sessionId)).toEqual(['a']);
        expect(filterSessions(sessions).map(s => s.sessionId)).toEqual(['a', 'b']);
    });
});

describe('joining', () => {
    it('indexes messages by session in time order', () => {
        const index = buildSessionIndex([MESSAGES[1], MESSAGES[0]]);

        expect(index.get('s1')?.map(m => m.messageId)).toEqual(['m1', 'm2']);
    });

    it('aggregates contacts from their messages', () => {
        const contacts = buildContacts(MESSAGES);

        expect(contacts.map(c => [c.contactId, c.sessionCount, c.messageCount, c.spanDays])).toEqual([
            ['c1', 1, 2, 0],
            ['c2', 1, 2, 1]
        ]);
    });

    it('reports messages referencing unknown sessions', () => {
        const dangling = findDanglingReferences(MESSAGES, [makeSession({ sessionId: 's1' })]);

        expect(dangling).toEqual({ messages: 2, sessionIds: ['s2'] });
    });
});

describe('loyalty tiers', () => {
    it('applies inclusive thresholds', () => {
        expect([1, 2, 4, 5, 9, 10, 25].map(assignLoyaltyTier)).toEqual([
            'single', 'occasional', 'occasional', 'regular', 'regular', 'frequent', 'frequent'
        ]);
    });

    it('is monotonic in session count', () => {
        const order = ['single', 'occasional', 'regular', 'frequent'];
        for (let n = 1; n < 30; n++) {
            expect(order.indexOf(assignLoyaltyTier(n + 1))).toBeGreaterThanOrEqual(order.indexOf(assignLoyaltyTier(n)));
        }
    });

    it('classifies a contact with exactly five and ten sessions', () => {
        const messages = Array.from({ length: 15 }, (_, i) => makeMessage({
            messageId: `m${i}`,
            contactId: i < 5 ? 'five' : 'ten',
            sessionId: `s${i}`
        }));

        const contacts = buildContacts(messages);

        expect(contacts.map(c => [c.contactId, c.tier])).toEqual([['five', 'regular'], ['ten', 'frequent']]);
    });

    it('computes shares, and zero shares with no contacts', () => {
        const distribution = computeLoyaltyDistribution(buildContacts(MESSAGES));

        expect(distribution.counts).toEqual({ single: 2, occasional: 0, regular: 0, frequent: 0 });
        expect(distribution.shares.single).toBe(1);
        expect(computeLoyaltyDistribution([]).shares).toEqual({ single: 0, occasional: 0, regular: 0, frequent: 0 });
    });
});

describe('computeVolume', () => {
    it('per-date counts sum to the total', () => {
        const volume = computeVolume(MESSAGES);
        const summed = Object.values(volume.byDate).reduce((total, count) => total + count.total, 0);

        expect(volume.totals).toEqual({ total: 4, inbound: 2, outbound: 1 });
        expect(summed).toBe(volume.totals.total);
    });

    it('fills days without messages in the daily series', () => {
        const volume = computeVolume(MESSAGES);

        expect(volume.dailySeries.map(d => [d.date, d.total])).toEqual([
            ['2025-07-20', 2],
            ['2025-07-21', 1],
            ['2025-07-22', 0],
            ['2025-07-23', 1]
        ]);
    });

    it('restricts counts to the range', () => {
        const volume = computeVolume(MESSAGES, { start: '2025-07-21', end: '2025-07-21' });

        expect(volume.totals.total).toBe(1);
        expect(volume.dailySeries).toEqual([{ date: '2025-07-21', total: 1, inbound: 1, outbound: 0 }]);
    });

    it('bounds the daily series by the dates that have messages', () => {
        const volume = computeVolume([MESSAGES[0]], { start: '1000-01-01', end: '9999-12-31' });

        expect(volume.dailySeries).toEqual([{ date: '2025-07-20', total: 1, inbound: 1, outbound: 0 }]);
    });

    it('bins by hour and weekday and places sessions at their first message', () => {
        const volume = computeVolume(MESSAGES);

        expect(volume.hourlyHistogram[10].total).toBe(2);
        expect(volume.weekdayHistogram[6].total).toBe(2);   // 2025-07-20 is a Sunday
        expect(volume.heatmap[6][10]).toBe(2);
        expect(volume.sessionsByDate).toEqual({ '2025-07-20': 1, '2025-07-21': 1 });
        expect(volume.sessionsByHour[14]).toBe(1);
    });

    it('finds peak hours at the 80th percentile of active hours', () => {
        const hourly = Array.from({ length: 24 }, (_, hour) => {
            const total = hour === 9 ? 10 : hour === 14 ? 8 : hour === 20 ? 1 : 0;
            return { total, inbound: total, outbound: 0 };
        });

        expect(findPeakHours(hourly)).toEqual([9]);
        expect(findPeakHours(Array.from({ length: 24 }, () => ({ total: 0, inbound: 0, outbound: 0 })))).toEqual([]);
    });

    it('returns zero counts for an empty table', () => {
        const volume = computeVolume([]);

        expect(volume.totals).toEqual({ total: 0, inbound: 0, outbound: 0 });
        expect(volume.dailySeries).toEqual([]);
        expect(volume.peakHours).toEqual([]);
    });
});

describe('computeScorecards', () => {
    const sessions = [
        makeSession({ sessionId: 's1', operatorId: 'op1', rating: 5, totalDurationSec: 1800, manualDurationSec: 1200 }),
        makeSession({ sessionId: 's2', operatorId: 'op1', rating: 3, totalDurationSec: 1800, manualDurationSec: 600 }),
        makeSession({ sessionId: 's3', operatorId: 'op1', rating: null, totalDurationSec: 0, manualDurationSec: 0 }),
        makeSession({ sessionId: 's4', operatorId: 'op2', rating: null }),
        makeSession({ sessionId: 's5', operatorId: null, rating: 2 })
    ];

    it('averages ratings over rated sessions only', () => {
        const { byOperator } = computeScorecards(sessions);

        expect(byOperator.op1.sessionCount).toBe(3);
        expect(byOperator.op1.ratedSessions).toBe(2);
        expect(byOperator.op1.averageRating).toBe(4);
        expect(byOperator.op1.satisfactionRate).toBe(0.5);
        expect(byOperator.op2.averageRating).toBeUndefined();
    });

    it('leaves zero-duration sessions out of efficiency', () => {
        const { byOperator } = computeScorecards(sessions);

        expect(byOperator.op1.timedSessions).toBe(2);
        expect(byOperator.op1.handleHours).toBe(1);
        expect(byOperator.op1.sessionsPerHour).toBe(2);
        expect(byOperator.op1.averageHandleTimeSec).toBe(600);
    });

    it('keeps sessions without an operator in the unassigned bucket', () => {
        const { operators, unassigned } = computeScorecards(sessions);

        expect(operators.map(card => card.operatorId)).toEqual(['op1', 'op2']);
        expect(unassigned).toEqual({ sessionCount: 1, ratedSessions: 1, averageRating: 2 });
    });

    it('keeps an operator whose id matches an object built-in', () => {
        const { byOperator } = computeScorecards([
            makeSession({ sessionId: 'a', operatorId: '__proto__', rating: 4 }),
            makeSession({ sessionId: 'b', operatorId: 'constructor', rating: 2 })
        ]);

        const cards = Object.entries(byOperator)
            .map(([id, card]) => [id, card.sessionCount, card.averageRating])
            .sort();

        expect(cards).toEqual([['__proto__', 1, 4], ['constructor', 1, 2]]);
    });

    it('honours a custom satisfaction threshold', () => {
        const { byOperator } = computeScorecards(sessions, {}, { satisfactionThreshold: 3 });

        expect(byOperator.op1.satisfactionRate).toBe(1);
    });
});

describe('latency', () => {
    it('summarises a distribution with buckets', () => {
        const summary = summariseDistribution([400, 100, 300, 200]);

        expect(summary.count).toBe(4);
        expect(summary.min).toBe(100);
        expect(summary.max).toBe(400);
        expect(summary.mean).toBe(250);
        expect(summary.median).toBe(250);
        expect(summary.p90).toBeCloseTo(370);
        expect(summary.buckets.map(b => [b.label, b.count])).toEqual([
            ['0-5m', 2], ['5-15m', 2], ['15-30m', 0], ['30-60m', 0], ['60m+', 0]
        ]);
    });

    it('returns undefined statistics when nothing is eligible', () => {
        const summary = summariseDistribution([]);

        expect(summary.count).toBe(0);
        expect(summary.mean).toBeUndefined();
        expect(summary.p95).toBeUndefined();
    });

    it('skips missing durations and groups by opening hour', () => {
        const latency = computeLatency([
            makeSession({ sessionId: 'a', queueDurationSec: 20, hour: 9 }),
            makeSession({ sessionId: 'b', queueDurationSec: null, hour: 9 }),
            makeSession({ sessionId: 'c', queueDurationSec: 40, hour: 15 })
        ]);

        expect(latency.queue.count).toBe(2);
        expect(latency.queue.mean).toBe(30);
        expect(latency.byHour[9].sessions).toBe(2);
        expect(latency.byHour[9].meanQueueSec).toBe(20);
        expect(latency.byHour[15].meanQueueSec).toBe(40);
        expect(latency.response.count).toBe(0);
    });
});

describe('breakdowns', () => {
    it('lists closure reasons with unknown always present', () => {
        const closures = computeClosureBreakdown([
            makeSession({ sessionId: 'a', closureReason: 'resolved' }),
            makeSession({ sessionId: 'b', closureReason: 'resolved' }),
            makeSession({ sessionId: 'c', closureReason: 'timeout' })
        ]);

        expect(closures.reasons.map(r => [r.reason, r.count])).toEqual([
            ['resolved', 2], ['timeout', 1], ['unknown', 0]
        ]);
        expect(closures.byReason.resolved.percentage).toBeCloseTo(66.667, 2);
        expect(closures.byReason.unknown.averageDurationSec).toBeUndefined();
    });

    it('counts message types, session channels and plugins', () => {
        const breakdown = computeChannelBreakdown(
            [
                makeMessage({ messageId: 'a', type: 'text', channel: 'whatsapp' }),
                makeMessage({ messageId: 'b', type: 'file', channel: 'whatsapp', sessionId: 's2' }),
                makeMessage({ messageId: 'c', type: 'event', channel: null })
            ],
            [
                makeSession({ sessionId: 's1', channel: 'whatsapp', pluginLabel: 'Main line' }),
                makeSession({ sessionId: 's2', channel: null, pluginLabel: null })
            ]
        );

        expect(breakdown.messagesByType).toEqual({ text: 1, file: 1, event: 1, unknown: 0 });
        expect(breakdown.sessionsByChannel).toEqual({ whatsapp: 1, unknown: 1 });
        expect(breakdown.sessionsByPlugin).toEqual([{ key: 'Main line', count: 1, percentage: 100 }]);
        expect(breakdown.messageChannels).toEqual([
            { channel: 'whatsapp', messages: 2, uniqueSessions: 2, uniqueContacts: 1, messagesPerSession: 1 }
        ]);
    });

    it('keeps channel and plugin names that match object built-ins as plain keys', () => {
        const breakdown = computeChannelBreakdown([], [
            makeSession({ sessionId: 's1', channel: 'constructor', pluginLabel: 'toString' }),
            makeSession({ sessionId: 's2', channel: '__proto__', pluginLabel: 'toString' })
        ]);

        expect(Object.entries(breakdown.sessionsByChannel)).toEqual([['constructor', 1], ['__proto__', 1]]);
        expect(Object.getPrototypeOf(breakdown.sessionsByChannel)).toBe(Object.prototype);
        expect(breakdown.sessionsByPlugin).toEqual([{ key: 'toString', count: 2, percentage: 100 }]);
    });

    it('categorises ratings', () => {
        expect([1, 2, 3, 4, 5].map(categoriseRating)).toEqual(['poor', 'poor', 'fair', 'good', 'excellent']);
    });

    it('breaks ratings down by stars and duration bucket', () => {
        const ratings = computeRatingBreakdown([
            makeSession({ sessionId: 'a', rating: 5, totalDurationSec: 120 }),
            makeSession({ sessionId: 'b', rating: 3, totalDurationSec: 200 }),
            makeSession({ sessionId: 'c', rating: null, totalDurationSec: 4000 })
        ]);

        expect(ratings.ratedSessions).toBe(2);
        expect(ratings.unratedSessions).toBe(1);
        expect(ratings.byStars).toEqual({ '1': 0, '2': 0, '3': 1, '4': 0, '5': 1 });
        expect(ratings.byDurationBucket[0]).toEqual({ label: '0-5m', count: 2, averageRating: 4 });
        expect(ratings.byDurationBucket[4]).toEqual({ label: '60m+', count: 1, averageRating: undefined });
    });

    it('summarises the overview', () => {
        const overview = computeOverview(MESSAGES, [makeSession({ sessionId: 's1', rating: 4 })]);

        expect(overview.messages).toBe(4);
        expect(overview.inbound).toBe(2);
        expect(overview.outbound).toBe(1);
        expect(overview.uniqueContacts).toBe(2);
        expect(overview.operators).toBe(1);
        expect(overview.firstMessageAt).toBe('2025-07-20T10:00:00.000Z');
        expect(overview.lastMessageAt).toBe('2025-07-23T09:30:00.000Z');
    });
});
