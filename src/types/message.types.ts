/**
 * Message, Session and Contact Type Definitions
 */

export type MessageDirection = 'inbound' | 'outbound' | 'unknown';

export type MessageType = 'text' | 'file' | 'event' | 'unknown';

/**
 * Closure reasons are an open vocabulary (configured in constants), so the
 * type stays a string. `unknown` is always present.
 */
export type ClosureReason = string;

export type LoyaltyTier = 'single' | 'occasional' | 'regular' | 'frequent';

/**
 * Calendar fields derived from an instant in the configured time zone
 */
export type CalendarFields = {
    date: string;       // YYYY-MM-DD
    hour: number;       // 0-23
    weekday: number;    // 0=Monday ... 6=Sunday
};

/**
 * One inbound or outbound content unit within a session
 */
export type Message = {
    tenantId: string | null;
    contactId: string;
    messageId: string;
    sessionId: string;
    direction: MessageDirection;
    type: MessageType;
    content: string;
    channel: string | null;
    createdAt: Date;
    updatedAt: Date | null;
    date: string;
    hour: number;
    weekday: number;
    contentLength: number;  // grapheme count
    emojiCount: number;
};

/**
 * One continuous customer/operator interaction
 */
export type Session = {
    sessionId: string;
    operatorId: string | null;
    queueDurationSec: number | null;
    manualDurationSec: number | null;
    totalDurationSec: number | null;
    rating: number | null;
    closureReason: ClosureReason;
    messageCount: number | null;
    openedAt: Date | null;
    queuedAt: Date | null;
    manualAt: Date | null;
    closedAt: Date | null;
    channel: string | null;
    pluginLabel: string | null;
    date: string | null;
    hour: number | null;
    weekday: number | null;
    handleEfficiency: number | undefined;   // 1 / total duration, only when total > 0
    responseTimeSec: number | null;         // manualAt - queuedAt
};

/**
 * Derived per contact id from their messages
 */
export type Contact = {
    contactId: string;
    firstInteraction: Date;
    lastInteraction: Date;
    spanDays: number;
    sessionCount: number;
    messageCount: number;
    tier: LoyaltyTier;
};

/**
 * Inclusive calendar date filter, both bounds in YYYY-MM-DD
 */
export type DateRange = {
    start?: string;
    end?: string;
};
