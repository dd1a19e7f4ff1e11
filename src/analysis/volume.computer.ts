/**
 * Message Volume Computation
 */

import type { DateRange, Message, VolumeCount, VolumeMetrics } from '../types';
import { PEAK_HOUR_QUANTILE } from '../utils/constants';
import { quantileSorted } from '../utils/stats.utils';
import { filterMessages, resolveRange } from './range.filter';
import { generateDailySeries } from './time-series.generator';

function emptyCount(): VolumeCount {
    return { total: 0, inbound: 0, outbound: 0 };
}

function add(count: VolumeCount, message: Message): void {
    count.total += 1;
    if (message.direction === 'inbound') count.inbound += 1;
    if (message.direction === 'outbound') count.outbound += 1;
}

/**
 * Hours whose volume is at or above the 80th percentile of the hours that
 * saw any traffic
 */
export function findPeakHours(hourly: readonly VolumeCount[], q: number = PEAK_HOUR_QUANTILE): number[] {
    const active = hourly.map(bin => bin.total).filter(total => total > 0);
    const threshold = quantileSorted([...active].sort((a, b) => a - b), q);
    if (threshold === undefined) return [];

    return hourly
        .map((bin, hour) => ({ hour, total: bin.total }))
        .filter(({ total }) => total > 0 && total >= threshold)
        .map(({ hour }) => hour);
}

/**
 * Counts messages by date, hour and weekday, split by direction.
 * Messages of unknown direction only count towards the totals.
 */
export function computeVolume(messages: readonly Message[], range?: DateRange): VolumeMetrics {
    const resolved = resolveRange(range);
    const selected = filterMessages(messages, range);

    const totals = emptyCount();
    const byDate: Record<string, VolumeCount> = {};
    const hourly = Array.from({ length: 24 }, emptyCount);
    const weekday = Array.from({ length: 7 }, emptyCount);
    const heatmap = Array.from({ length: 7 }, () => Array<number>(24).fill(0));

    // Sessions are placed at their earliest message
    const sessionStart = new Map<string, Message>();

    for (const m of selected) {
        add(totals, m);
        if (!byDate[m.date]) byDate[m.date] = emptyCount();
        add(byDate[m.date], m);
        add(hourly[m.hour], m);
        add(weekday[m.weekday], m);
        heatmap[m.weekday][m.hour] += 1;

        const first = sessionStart.get(m.sessionId);
        if (!first || m.createdAt < first.createdAt) {
            sessionStart.set(m.sessionId, m);
        }
    }

    const sessionsByDate: Record<string, number> = {};
    const sessionsByHour = Array<number>(24).fill(0);
    for (const m of sessionStart.values()) {
        sessionsByDate[m.date] = (sessionsByDate[m.date] ?? 0) + 1;
        sessionsByHour[m.hour] += 1;
    }

    return {
        totals,
        byDate,
        dailySeries: generateDailySeries(byDate, resolved.start, resolved.end),
        hourlyHistogram: hourly,
        weekdayHistogram: weekday,
        heatmap,
        peakHours: findPeakHours(hourly),
        sessionsByDate,
        sessionsByHour
    };
}
