import type {
    Message,
    MessageDirection,
    MessageType,
    RowResult,
    Session
} from '../types';
import type { FieldRow } from '../parsers/csv-table.parser';
import {
    DEFAULT_CLOSURE_REASONS,
    DEFAULT_TIME_ZONE,
    MESSAGE_COLUMNS,
    MESSAGE_TYPE_ALIASES,
    RATING_MAX,
    RATING_MIN,
    SESSION_COLUMNS,
    UNKNOWN
} from '../utils/constants';
import { parseTimestamp, toCalendarFields } from '../utils/date.utils';
import {
    blankToNull,
    countEmojis,
    countGraphemes,
    stripControlMarks,
    toVocabularyKey
} from '../utils/text.utils';

// ============================================================================
// FIELD NORMALISATION
// ============================================================================

export type MessageField = keyof typeof MESSAGE_COLUMNS;
export type SessionField = keyof typeof SESSION_COLUMNS;

export type NormaliserOptions = {
    timeZone?: string;
    closureReasons?: readonly string[];
};

type Parsed<T> = { ok: true; value: T } | { ok: false };

/**
 * Reads a non-negative number of seconds. Blank cells are null.
 */
export function parseDuration(raw: string | undefined): Parsed<number | null> {
    const text = blankToNull(raw);
    if (text === null) return { ok: true, value: null };
    const value = Number(text);
    if (!Number.isFinite(value) || value < 0) return { ok: false };
    return { ok: true, value };
}

/**
 * Reads a star rating within the valid scale. Blank cells are null.
 */
export function parseRating(raw: string | undefined): Parsed<number | null> {
    const text = blankToNull(raw);
    if (text === null) return { ok: true, value: null };
    const value = Number(text);
    if (!Number.isFinite(value) || value < RATING_MIN || value > RATING_MAX) return { ok: false };
    return { ok: true, value };
}

export function normaliseDirection(raw: string | undefined): MessageDirection {
    const key = toVocabularyKey(raw ?? '');
    return key === 'inbound' || key === 'outbound' ? key : 'unknown';
}

export function normaliseMessageType(raw: string | undefined): MessageType {
    const key = toVocabularyKey(raw ?? '');
    return MESSAGE_TYPE_ALIASES.get(key) ?? 'unknown';
}

/**
 * Maps a free-form closure label onto the configured vocabulary
 */
export function normaliseClosureReason(
    raw: string | undefined,
    vocabulary: readonly string[] = DEFAULT_CLOSURE_REASONS
): string {
    const key = toVocabularyKey(raw ?? '');
    return key && vocabulary.includes(key) ? key : UNKNOWN;
}

/**
 * Reads an optional timestamp, noting values that are present but unparseable
 */
function optionalTimestamp(raw: string | undefined, field: string, notes: string[]): Date | null {
    if (blankToNull(raw) === null) return null;
    const parsed = parseTimestamp(raw);
    if (parsed === null) notes.push(`invalid-${field}`);
    return parsed;
}

/**
 * Converts one raw message row into a typed Message
 */
export function normaliseMessageRow(
    row: FieldRow<MessageField>,
    options: NormaliserOptions = {}
): RowResult<Message> {
    const notes: string[] = [];
    const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;

    const contactId = blankToNull(row.contactId);
    if (contactId === null) return { ok: false, reason: 'missing-contactID' };
    const messageId = blankToNull(row.messageId);
    if (messageId === null) return { ok: false, reason: 'missing-messageID' };
    const sessionId = blankToNull(row.sessionId);
    if (sessionId === null) return { ok: false, reason: 'missing-sessionID' };
    const createdAt = parseTimestamp(row.createdAt);
    if (createdAt === null) return { ok: false, reason: 'invalid-createdAt' };

    const direction = normaliseDirection(row.direction);
    if (direction === 'unknown') notes.push('unknown-direction');
    const type = normaliseMessageType(row.type);
    if (type === 'unknown') notes.push('unknown-type');

    const content = stripControlMarks(row.content ?? '');
    const calendar = toCalendarFields(createdAt, timeZone);

    return {
        ok: true,
        notes,
        value: {
            tenantId: blankToNull(row.tenantId),
            contactId,
            messageId,
            sessionId,
            direction,
            type,
            content,
            channel: blankToNull(row.channel),
            createdAt,
            updatedAt: optionalTimestamp(row.updatedAt, 'updatedAt', notes),
            date: calendar.date,
            hour: calendar.hour,
            weekday: calendar.weekday,
            contentLength: countGraphemes(content),
            emojiCount: countEmojis(content)
        }
    };
}

/**
 * Converts one raw session row into a typed Session, enforcing the duration
 * and rating invariants
 */
export function normaliseSessionRow(
    row: FieldRow<SessionField>,
    options: NormaliserOptions = {}
): RowResult<Session> {
    const notes: string[] = [];
    const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;

    const sessionId = blankToNull(row.sessionId);
    if (sessionId === null) return { ok: false, reason: 'missing-sessionID' };

    const queue = parseDuration(row.queueDuration);
    if (!queue.ok) return { ok: false, reason: 'invalid-queueDuration' };
    const manual = parseDuration(row.manualDuration);
    if (!manual.ok) return { ok: false, reason: 'invalid-manualDuration' };
    const total = parseDuration(row.totalDuration);
    if (!total.ok) return { ok: false, reason: 'invalid-totalDuration' };
    if (total.value !== null && manual.value !== null && total.value < manual.value) {
        return { ok: false, reason: 'manual-exceeds-total' };
    }

    const rating = parseRating(row.rating);
    if (!rating.ok) return { ok: false, reason: 'invalid-rating' };

    let messageCount: number | null = null;
    const rawCount = blankToNull(row.messageCount);
    if (rawCount !== null) {
        const count = Number(rawCount);
        if (Number.isInteger(count) && count >= 0) {
            messageCount = count;
        } else {
            notes.push('invalid-messageCount');
        }
    }

    const closureReason = normaliseClosureReason(row.closureReason, options.closureReasons);
    if (closureReason === UNKNOWN && blankToNull(row.closureReason) !== null) {
        notes.push('unknown-closure-reason');
    }

    const openedAt = optionalTimestamp(row.openedAt, 'createdAt', notes);
    const queuedAt = optionalTimestamp(row.queuedAt, 'queuedAt', notes);
    const manualAt = optionalTimestamp(row.manualAt, 'manualAt', notes);
    const closedAt = optionalTimestamp(row.closedAt, 'closedAt', notes);
    const calendar = openedAt ? toCalendarFields(openedAt, timeZone) : null;

    const responseTimeSec = queuedAt && manualAt && manualAt.getTime() >= queuedAt.getTime()
        ? (manualAt.getTime() - queuedAt.getTime()) / 1000
        : null;

    return {
        ok: true,
        notes,
        value: {
            sessionId,
            operatorId: blankToNull(row.operatorId),
            queueDurationSec: queue.value,
            manualDurationSec: manual.value,
            totalDurationSec: total.value,
            rating: rating.value,
            closureReason,
            messageCount,
            openedAt,
            queuedAt,
            manualAt,
            closedAt,
            channel: blankToNull(row.channel),
            pluginLabel: blankToNull(row.pluginLabel),
            date: calendar ? calendar.date : null,
            hour: calendar ? calendar.hour : null,
            weekday: calendar ? calendar.weekday : null,
            handleEfficiency: total.value !== null && total.value > 0 ? 1 / total.value : undefined,
            responseTimeSec
        }
    };
}
