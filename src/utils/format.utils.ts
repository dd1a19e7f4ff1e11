import type { VolumeCount } from '../types';
import { WEEKDAY_NAMES } from './constants';

// ============================================================================
// FORMATTING FUNCTIONS
// ============================================================================

/**
 * Formats a number with thousands separators (en-US, so output is stable)
 */
export function formatNumber(num: number): string {
    return num.toLocaleString('en-US');
}

/**
 * Formats a 0..1 fraction as a percentage with one decimal
 */
export function formatPercent(fraction: number): string {
    return `${(fraction * 100).toFixed(1)}%`;
}

/**
 * Formats a duration in seconds as "1h 5m", "4m 10s" or "12s"
 */
export function formatDuration(totalSeconds: number): string {
    const seconds = Math.floor(totalSeconds);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);
    const days = Math.floor(hours / 24);

    if (days > 0) {
        return `${days}d ${hours % 24}h ${minutes % 60}m`;
    } else if (hours > 0) {
        return `${hours}h ${minutes % 60}m`;
    } else if (minutes > 0) {
        return `${minutes}m ${seconds % 60}s`;
    }
    return `${seconds}s`;
}

/**
 * Formats an hour of day as "09:00"
 */
export function formatHour(hour: number): string {
    return `${hour.toString().padStart(2, '0')}:00`;
}

/**
 * Formats weekday histogram with actual day names (Monday first)
 */
export function formatWeekdayHistogram(histogram: VolumeCount[]): Array<{ day: string; count: number; percentage: number }> {
    const total = histogram.reduce((sum, bin) => sum + bin.total, 0);
    return histogram.map((bin, index) => ({
        day: WEEKDAY_NAMES[index],
        count: bin.total,
        percentage: total > 0 ? (bin.total / total * 100) : 0
    }));
}
