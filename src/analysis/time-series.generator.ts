import type { VolumeCount } from '../types';
import { enumerateDates } from '../utils/date.utils';

// ============================================================================
// TIME SERIES GENERATION
// ============================================================================

/**
 * Turns sparse per-date counts into a chronological daily series, filling
 * the dates with no messages with zeros. The series spans the dates that have
 * counts, cut to `start`..`end`.
 */
export function generateDailySeries(
    byDate: Record<string, VolumeCount>,
    start?: string | null,
    end?: string | null
): Array<{ date: string } & VolumeCount> {
    const dates = Object.keys(byDate)
        .filter(date => (!start || date >= start) && (!end || date <= end))
        .sort();
    const first = dates[0];
    const last = dates[dates.length - 1];

    if (first === undefined || last === undefined) {
        return [];
    }

    return enumerateDates(first, last).map(date => ({
        date,
        total: byDate[date]?.total ?? 0,
        inbound: byDate[date]?.inbound ?? 0,
        outbound: byDate[date]?.outbound ?? 0
    }));
}
