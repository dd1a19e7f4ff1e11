/**
 * Metrics and Analytics Type Definitions
 */

/**
 * Message count split by direction. Messages of unknown direction only
 * count towards `total`.
 */
export type VolumeCount = {
    total: number;
    inbound: number;
    outbound: number;
};

export type VolumeMetrics = {
    totals: VolumeCount;
    byDate: Record<string, VolumeCount>;
    dailySeries: Array<{ date: string } & VolumeCount>;  // gap-filled, chronological
    hourlyHistogram: VolumeCount[];                      // 24 bins
    weekdayHistogram: VolumeCount[];                     // 7 bins, 0=Monday
    heatmap: number[][];                                 // 7x24 grid (weekday x hour)
    peakHours: number[];
    sessionsByDate: Record<string, number>;              // unique session ids first seen that day
    sessionsByHour: number[];
};

export type OperatorScorecard = {
    operatorId: string;
    sessionCount: number;
    ratedSessions: number;
    averageRating: number | undefined;
    averageHandleTimeSec: number | undefined;
    averageDurationSec: number | undefined;
    medianDurationSec: number | undefined;
    averageQueueSec: number | undefined;
    totalMessages: number;
    averageMessagesPerSession: number | undefined;
    timedSessions: number;      // sessions with a positive total duration
    handleHours: number;
    sessionsPerHour: number | undefined;
    satisfactionRate: number | undefined;
};

export type UnassignedBucket = {
    sessionCount: number;
    ratedSessions: number;
    averageRating: number | undefined;
};

export type ScorecardMetrics = {
    operators: OperatorScorecard[];
    byOperator: Record<string, OperatorScorecard>;
    unassigned: UnassignedBucket;
};

export type DurationBucket = {
    label: string;
    minSec: number;
    maxSec: number | null;
    count: number;
};

export type Distribution = {
    count: number;
    min: number | undefined;
    max: number | undefined;
    mean: number | undefined;
    median: number | undefined;
    p50: number | undefined;
    p90: number | undefined;
    p95: number | undefined;
    buckets: DurationBucket[];
};

export type HourlyLatency = {
    hour: number;
    sessions: number;
    meanQueueSec: number | undefined;
    medianQueueSec: number | undefined;
    meanDurationSec: number | undefined;
    medianDurationSec: number | undefined;
};

export type LatencyMetrics = {
    queue: Distribution;
    manual: Distribution;
    total: Distribution;
    response: Distribution;
    byHour: HourlyLatency[];
};

export type ClosureEntry = {
    reason: string;
    count: number;
    percentage: number;
    averageDurationSec: number | undefined;
    averageMessages: number | undefined;
    averageRating: number | undefined;
};

export type ClosureMetrics = {
    totalSessions: number;
    reasons: ClosureEntry[];
    byReason: Record<string, ClosureEntry>;
};

export type ShareEntry = {
    key: string;
    count: number;
    percentage: number;
};

export type MessageChannelEntry = {
    channel: string;
    messages: number;
    uniqueSessions: number;
    uniqueContacts: number;
    messagesPerSession: number;
};

export type BreakdownMetrics = {
    messagesByType: Record<string, number>;
    sessionsByChannel: Record<string, number>;
    sessionsByPlugin: ShareEntry[];
    messageChannels: MessageChannelEntry[];
};

export type RatingCategory = 'poor' | 'fair' | 'good' | 'excellent';

export type RatingMetrics = {
    ratedSessions: number;
    unratedSessions: number;
    averageRating: number | undefined;
    byStars: Record<string, number>;
    byCategory: Record<RatingCategory, number>;
    byDurationBucket: Array<{ label: string; count: number; averageRating: number | undefined }>;
};

export type OverviewMetrics = {
    messages: number;
    inbound: number;
    outbound: number;
    uniqueContacts: number;
    uniqueMessageSessions: number;
    sessions: number;
    operators: number;
    averageDurationSec: number | undefined;
    averageQueueSec: number | undefined;
    averageRating: number | undefined;
    firstMessageAt: string | undefined;
    lastMessageAt: string | undefined;
};
