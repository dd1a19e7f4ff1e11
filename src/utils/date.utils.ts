/**
 * Date Parsing Utilities
 */

import type { CalendarFields } from '../types';
import { ISO_DATE_REGEX, TIMEZONE_SUFFIX_REGEX } from './constants';

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// TIMESTAMP PARSING
// ============================================================================

/**
 * Export timestamp examples:
 *   "2025-07-20T10:00:00.000Z"
 *   "2025-07-20T07:00:00-03:00"
 *   "2025-07-20T10:00:00+0000"   (offset without colon)
 *   "2025-07-20 10:00:00"        (no offset, read as UTC)
 * Returns null for blank or unparseable input.
 */
export function parseTimestamp(raw: string | undefined): Date | null {
    if (raw === undefined) return null;
    let text = raw.trim();
    if (!text) return null;

    // Space separated date/time is common in spreadsheet re-exports
    text = text.replace(/^(\d{4}-\d{2}-\d{2})\s+(\d)/, '$1T$2');
    // +0000 -> +00:00
    text = text.replace(/([+-]\d{2})(\d{2})$/, '$1:$2');

    if (text.includes('T') && !TIMEZONE_SUFFIX_REGEX.test(text)) {
        text += 'Z';
    }

    const datePart = /^\d{4}-\d{2}-\d{2}/.exec(text);
    // Date.parse rolls impossible days such as 02-30 into the next month
    if (!datePart || !isValidIsoDate(datePart[0])) return null;

    const ms = Date.parse(text);
    return Number.isNaN(ms) ? null : new Date(ms);
}

// ============================================================================
// CALENDAR FIELDS
// ============================================================================

const FORMATTERS = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
    let formatter = FORMATTERS.get(timeZone);
    if (!formatter) {
        formatter = new Intl.DateTimeFormat('en-US', {
            timeZone,
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
            hour: '2-digit',
            hourCycle: 'h23',
            weekday: 'short'
        });
        FORMATTERS.set(timeZone, formatter);
    }
    return formatter;
}

const SHORT_WEEKDAYS: Record<string, number> = {
    Mon: 0, Tue: 1, Wed: 2, Thu: 3, Fri: 4, Sat: 5, Sun: 6
};

/**
 * Checks that a string names an IANA zone the runtime knows
 */
export function isValidTimeZone(timeZone: string): boolean {
    try {
        getFormatter(timeZone);
        return true;
    } catch {
        return false;
    }
}

/**
 * Derives date, hour and weekday (0=Monday) for an instant in a time zone
 */
export function toCalendarFields(instant: Date, timeZone: string): CalendarFields {
    if (timeZone === 'UTC') {
        return {
            date: instant.toISOString().slice(0, 10),
            hour: instant.getUTCHours(),
            weekday: (instant.getUTCDay() + 6) % 7
        };
    }

    const parts: Record<string, string> = {};
    for (const part of getFormatter(timeZone).formatToParts(instant)) {
        parts[part.type] = part.value;
    }

    return {
        date: `${parts.year}-${parts.month}-${parts.day}`,
        hour: parseInt(parts.hour, 10) % 24,
        weekday: SHORT_WEEKDAYS[parts.weekday] ?? 0
    };
}

// ============================================================================
// CALENDAR DATE HELPERS
// ============================================================================

/**
 * True for a real YYYY-MM-DD calendar date (rejects 2025-02-30)
 */
export function isValidIsoDate(value: string): boolean {
    const match = ISO_DATE_REGEX.exec(value);
    if (!match) return false;
    const [, y, m, d] = match;
    const ms = Date.UTC(parseInt(y, 10), parseInt(m, 10) - 1, parseInt(d, 10));
    return new Date(ms).toISOString().slice(0, 10) === value;
}

/**
 * Lists every calendar date from start to end inclusive
 */
export function enumerateDates(start: string, end: string): string[] {
    const dates: string[] = [];
    const endMs = Date.parse(`${end}T00:00:00Z`);
    for (let ms = Date.parse(`${start}T00:00:00Z`); ms <= endMs; ms += DAY_MS) {
        dates.push(new Date(ms).toISOString().slice(0, 10));
    }
    return dates;
}

/**
 * Whole days between two instants (floored)
 */
export function daysBetween(from: Date, to: Date): number {
    return Math.floor((to.getTime() - from.getTime()) / DAY_MS);
}
