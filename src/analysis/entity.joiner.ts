import type { Contact, Message, Session } from '../types';
import { MAX_DANGLING_IDS_REPORTED } from '../utils/constants';
import { daysBetween } from '../utils/date.utils';
import { assignLoyaltyTier } from './loyalty.classifier';

// ============================================================================
// ENTITY JOINING
// ============================================================================

function byCreatedAt(a: Message, b: Message): number {
    return a.createdAt.getTime() - b.createdAt.getTime() || a.messageId.localeCompare(b.messageId);
}

/**
 * Groups messages by session id, each list in chronological order
 */
export function buildSessionIndex(messages: readonly Message[]): Map<string, Message[]> {
    const index = new Map<string, Message[]>();
    for (const message of messages) {
        const list = index.get(message.sessionId);
        if (list) {
            list.push(message);
        } else {
            index.set(message.sessionId, [message]);
        }
    }
    for (const list of index.values()) {
        list.sort(byCreatedAt);
    }
    return index;
}

/**
 * Aggregates contacts from their messages: distinct sessions, message count,
 * first/last interaction and loyalty tier. Sorted by contact id.
 */
export function buildContacts(messages: readonly Message[]): Contact[] {
    const acc = new Map<string, { first: Date; last: Date; sessions: Set<string>; messages: number }>();

    for (const message of messages) {
        const entry = acc.get(message.contactId);
        if (!entry) {
            acc.set(message.contactId, {
                first: message.createdAt,
                last: message.createdAt,
                sessions: new Set([message.sessionId]),
                messages: 1
            });
            continue;
        }
        if (message.createdAt < entry.first) entry.first = message.createdAt;
        if (message.createdAt > entry.last) entry.last = message.createdAt;
        entry.sessions.add(message.sessionId);
        entry.messages += 1;
    }

    return Array.from(acc.entries())
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([contactId, entry]) => ({
            contactId,
            firstInteraction: entry.first,
            lastInteraction: entry.last,
            spanDays: daysBetween(entry.first, entry.last),
            sessionCount: entry.sessions.size,
            messageCount: entry.messages,
            tier: assignLoyaltyTier(entry.sessions.size)
        }));
}

export type DanglingReferences = {
    messages: number;
    sessionIds: string[];
};

/**
 * Finds messages whose session id matches no loaded session. Only the first
 * few ids are listed; `messages` counts every affected message.
 */
export function findDanglingReferences(
    messages: readonly Message[],
    sessions: readonly Session[]
): DanglingReferences {
    const known = new Set(sessions.map(s => s.sessionId));
    const ids = new Set<string>();
    let count = 0;

    for (const message of messages) {
        if (!known.has(message.sessionId)) {
            count += 1;
            ids.add(message.sessionId);
        }
    }

    return { messages: count, sessionIds: Array.from(ids).slice(0, MAX_DANGLING_IDS_REPORTED) };
}

export type JoinedEntities = {
    sessionMessages: Map<string, Message[]>;
    contacts: Contact[];
    dangling: DanglingReferences;
};

export function joinEntities(messages: readonly Message[], sessions: readonly Session[]): JoinedEntities {
    return {
        sessionMessages: buildSessionIndex(messages),
        contacts: buildContacts(messages),
        dangling: findDanglingReferences(messages, sessions)
    };
}
