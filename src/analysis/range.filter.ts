import type { DateRange, Message, Session } from '../types';
import { InvalidRangeError } from '../utils/errors';
import { isValidIsoDate } from '../utils/date.utils';

// ============================================================================
// DATE RANGE FILTERING
// ============================================================================

export type ResolvedRange = {
    start: string | null;
    end: string | null;
};

/**
 * Validates a caller-supplied range. Malformed bounds and a start after the
 * end are rejected rather than corrected.
 */
export function resolveRange(range: DateRange = {}): ResolvedRange {
    const start = range.start ?? null;
    const end = range.end ?? null;

    if (start !== null && !isValidIsoDate(start)) {
        throw new InvalidRangeError(`Invalid start date "${start}" (expected YYYY-MM-DD)`, range.start, range.end);
    }
    if (end !== null && !isValidIsoDate(end)) {
        throw new InvalidRangeError(`Invalid end date "${end}" (expected YYYY-MM-DD)`, range.start, range.end);
    }
    if (start !== null && end !== null && start > end) {
        throw new InvalidRangeError(`Start date ${start} is after end date ${end}`, range.start, range.end);
    }

    return { start, end };
}

/**
 * Inclusive check on YYYY-MM-DD keys. Rows without a date only pass an
 * unbounded range.
 */
export function isInRange(date: string | null, range: ResolvedRange): boolean {
    if (range.start === null && range.end === null) return true;
    if (date === null) return false;
    if (range.start !== null && date < range.start) return false;
    if (range.end !== null && date > range.end) return false;
    return true;
}

export function filterMessages(messages: readonly Message[], range?: DateRange): Message[] {
    const resolved = resolveRange(range);
    return messages.filter(m => isInRange(m.date, resolved));
}

/**
 * Sessions are placed in time by the date they were opened
 */
export function filterSessions(sessions: readonly Session[], range?: DateRange): Session[] {
    const resolved = resolveRange(range);
    return sessions.filter(s => isInRange(s.date, resolved));
}
