import { fileURLToPath } from "node:url";
import type { Message, Session } from '../src/types';
import { toCalendarFields } from '../src/utils/date.utils';

export const FIXTURES_DIR = fileURLToPath(new URL('./fixtures', import.meta.url));

export function fixturePath(name: string): string {
    return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

/**
 * Builds a normalised message; calendar fields follow `createdAt` in UTC
 */
export function makeMessage(overrides: Partial<Message> & { createdAt?: Date } = {}): Message {
    const createdAt = overrides.createdAt ?? new Date('2025-07-20T10:00:00Z');
    const calendar = toCalendarFields(createdAt, 'UTC');
    return {
        tenantId: 't1',
        contactId: 'c1',
        messageId: 'm1',
        sessionId: 's1',
        direction: 'inbound',
        type: 'text',
        content: 'hello',
        channel: null,
        updatedAt: null,
        contentLength: 5,
        emojiCount: 0,
        ...calendar,
        ...overrides,
        createdAt
    };
}

/**
 * Builds a normalised session opened on 2025-07-20 at 10:00 UTC unless overridden
 */
export function makeSession(overrides: Partial<Session> = {}): Session {
    const total = overrides.totalDurationSec === undefined ? 300 : overrides.totalDurationSec;
    return {
        sessionId: 's1',
        operatorId: 'op1',
        queueDurationSec: 30,
        manualDurationSec: 240,
        totalDurationSec: total,
        rating: null,
        closureReason: 'resolved',
        messageCount: 2,
        openedAt: new Date('2025-07-20T10:00:00Z'),
        queuedAt: null,
        manualAt: null,
        closedAt: null,
        channel: null,
        pluginLabel: null,
        date: '2025-07-20',
        hour: 10,
        weekday: 6,
        handleEfficiency: total !== null && total > 0 ? 1 / total : undefined,
        responseTimeSec: null,
        ...overrides
    };
}
