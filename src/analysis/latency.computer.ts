/**
 * Latency Distribution Computation
 */

import type { DateRange, Distribution, DurationBucket, HourlyLatency, LatencyMetrics, Session } from '../types';
import { DURATION_BUCKETS } from '../utils/constants';
import { mean, present, quantileSorted } from '../utils/stats.utils';
import { filterSessions } from './range.filter';

/**
 * Places each value in the first bucket whose upper bound it is below
 */
export function bucketDurations(values: readonly number[]): DurationBucket[] {
    const buckets = DURATION_BUCKETS.map(b => ({ ...b, count: 0 }));
    for (const value of values) {
        const bucket = buckets.find(b => value >= b.minSec && (b.maxSec === null || value < b.maxSec));
        if (bucket) bucket.count += 1;
    }
    return buckets;
}

/**
 * Summary statistics plus histogram buckets. All statistics are undefined
 * when there are no values.
 */
export function summariseDistribution(values: readonly number[]): Distribution {
    const sorted = [...values].sort((a, b) => a - b);
    const median = quantileSorted(sorted, 0.5);

    return {
        count: sorted.length,
        min: sorted.length > 0 ? sorted[0] : undefined,
        max: sorted.length > 0 ? sorted[sorted.length - 1] : undefined,
        mean: mean(sorted),
        median,
        p50: median,
        p90: quantileSorted(sorted, 0.9),
        p95: quantileSorted(sorted, 0.95),
        buckets: bucketDurations(sorted)
    };
}

/**
 * Queue and duration averages per hour the session was opened
 */
export function computeLatencyByHour(sessions: readonly Session[]): HourlyLatency[] {
    const byHour = Array.from({ length: 24 }, (): Session[] => []);
    for (const session of sessions) {
        if (session.hour !== null) byHour[session.hour].push(session);
    }

    return byHour.map((list, hour) => {
        const queue = summariseDistribution(present(list.map(s => s.queueDurationSec)));
        const total = summariseDistribution(present(list.map(s => s.totalDurationSec)));
        return {
            hour,
            sessions: list.length,
            meanQueueSec: queue.mean,
            medianQueueSec: queue.median,
            meanDurationSec: total.mean,
            medianDurationSec: total.median
        };
    });
}

export function computeLatency(sessions: readonly Session[], range?: DateRange): LatencyMetrics {
    const selected = filterSessions(sessions, range);

    return {
        queue: summariseDistribution(present(selected.map(s => s.queueDurationSec))),
        manual: summariseDistribution(present(selected.map(s => s.manualDurationSec))),
        total: summariseDistribution(present(selected.map(s => s.totalDurationSec))),
        response: summariseDistribution(present(selected.map(s => s.responseTimeSec))),
        byHour: computeLatencyByHour(selected)
    };
}
