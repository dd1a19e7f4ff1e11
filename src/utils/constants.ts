/**
 * Constants and Configuration Values
 */

import emojiRegex from "emoji-regex";
import { fileURLToPath } from "node:url";
import type { LoyaltyTier, SourceName } from '../types';

// ============================================================================
// LOADING CONFIGURATION
// ============================================================================

export const DEFAULT_ENCODING = 'utf8';
export const DEFAULT_DELIMITER = ',';
export const DEFAULT_CHUNK_SIZE = 64 * 1024;    // bytes per read from disk
export const DEFAULT_TIME_ZONE = 'UTC';

/**
 * File names the support desk uses for its exports, tried before sniffing headers
 */
export const DEFAULT_SOURCE_FILES: Record<SourceName, string> = {
    messages: 'messages.csv',
    sessions: 'sessions.csv',
    sessionsWithChannel: 'sessions_with_channel.csv'
};

export const SOURCE_NAMES: readonly SourceName[] = ['messages', 'sessions', 'sessionsWithChannel'];

export const MAX_DANGLING_IDS_REPORTED = 20;

// ============================================================================
// COLUMN CONTRACT
// ============================================================================

/**
 * Accepted header names per field; the first entry is canonical
 */
export const MESSAGE_COLUMNS = {
    tenantId: ['tenantID', 'tenantId'],
    contactId: ['contactID', 'contactId'],
    messageId: ['messageID', 'messageId'],
    sessionId: ['sessionID', 'sessionId'],
    direction: ['messageDirection', 'direction'],
    type: ['messageKey', 'messageType', 'type'],
    content: ['messageValue', 'content'],
    createdAt: ['createdAt'],
    updatedAt: ['updatedAt'],
    channel: ['messageChannel']
} as const;

export const MESSAGE_REQUIRED_COLUMNS = ['contactId', 'messageId', 'sessionId', 'createdAt'] as const;

export const SESSION_COLUMNS = {
    sessionId: ['sessionID', 'sessionId'],
    operatorId: ['operatorID', 'operatorId', 'operatorFirstname'],
    queueDuration: ['__sessionQueueDuration', 'queueDuration'],
    manualDuration: ['__sessionManualDuration', 'manualDuration'],
    totalDuration: ['__sessionDuration', 'totalDuration'],
    rating: ['sessionRatingStars', 'rating'],
    closureReason: ['closeMotive', 'closureReason'],
    messageCount: ['__sessionMessagesCount', 'messageCount'],
    openedAt: ['createdAt', 'openedAt'],
    queuedAt: ['queuedAt'],
    manualAt: ['manualAt'],
    closedAt: ['closedAt'],
    channel: ['sessionChannel', 'channel'],
    pluginLabel: ['pluginConnectionLabel']
} as const;

export const SESSION_REQUIRED_COLUMNS = ['sessionId'] as const;

// ============================================================================
// VOCABULARIES
// ============================================================================

export const MESSAGE_TYPE_ALIASES: ReadonlyMap<string, 'text' | 'file' | 'event'> = new Map<string, 'text' | 'file' | 'event'>([
    ['text', 'text'],
    ['file', 'file'],
    ['image', 'file'],
    ['audio', 'file'],
    ['video', 'file'],
    ['document', 'file'],
    ['event', 'event']
]);

export const DEFAULT_CLOSURE_REASONS: readonly string[] = [
    'resolved',
    'abandoned',
    'inactivity',
    'timeout',
    'transferred',
    'closed_by_operator',
    'closed_by_customer',
    'closed_by_system',
    'spam'
];

export const UNKNOWN = 'unknown';

// ============================================================================
// ANALYSIS CONFIGURATION
// ============================================================================

export const RATING_MIN = 1;
export const RATING_MAX = 5;
export const DEFAULT_SATISFACTION_THRESHOLD = 4;
export const PEAK_HOUR_QUANTILE = 0.8;
export const MAX_NEGATIVE_SAMPLES = 10;

/**
 * Inclusive lower bound of each tier, checked from the top down
 */
export const LOYALTY_THRESHOLDS: ReadonlyArray<{ tier: LoyaltyTier; minSessions: number }> = [
    { tier: 'frequent', minSessions: 10 },
    { tier: 'regular', minSessions: 5 },
    { tier: 'occasional', minSessions: 2 },
    { tier: 'single', minSessions: 1 }
];

export const LOYALTY_TIERS: readonly LoyaltyTier[] = ['single', 'occasional', 'regular', 'frequent'];

/**
 * Session duration buckets in seconds (upper bound exclusive)
 */
export const DURATION_BUCKETS: ReadonlyArray<{ label: string; minSec: number; maxSec: number | null }> = [
    { label: '0-5m', minSec: 0, maxSec: 5 * 60 },
    { label: '5-15m', minSec: 5 * 60, maxSec: 15 * 60 },
    { label: '15-30m', minSec: 15 * 60, maxSec: 30 * 60 },
    { label: '30-60m', minSec: 30 * 60, maxSec: 60 * 60 },
    { label: '60m+', minSec: 60 * 60, maxSec: null }
];

// Minimum qualifying records before an insight is reported
export const DEFAULT_MIN_RATED_SESSIONS = 1;
export const DEFAULT_MIN_EFFICIENCY_SESSIONS = 1;
export const DEFAULT_MIN_MESSAGES = 1;
export const DEFAULT_MIN_CLASSIFIED = 1;
export const DEFAULT_MIN_CONTACTS = 1;

// ============================================================================
// REGEX PATTERNS
// ============================================================================

export const EMOJI_REGEX = emojiRegex();
// Control & direction marks often injected by chat widgets (e.g., U+200E) and the BOM
export const CONTROL_MARKS_REGEX = /[\u200E\u200F\u202A-\u202E\u2066-\u2069\uFEFF]/g;

export const ISO_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;
export const TIMEZONE_SUFFIX_REGEX = /(Z|[+-]\d{2}:?\d{2})$/i;

// ============================================================================
// PATHS
// ============================================================================

export const DEFAULT_LEXICON_PATH = fileURLToPath(new URL('../../config/sentiment-lexicon.json', import.meta.url));

export const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];
