/**
 * Classification and Insight Type Definitions
 */

import type { Contact, LoyaltyTier, Message, Session } from './message.types';
import type { LoadReport } from './source.types';
import type {
    BreakdownMetrics,
    ClosureMetrics,
    LatencyMetrics,
    OverviewMetrics,
    RatingMetrics,
    ScorecardMetrics,
    VolumeMetrics
} from './metrics.types';

export type SentimentTag = 'positive' | 'neutral' | 'negative';

/**
 * Result of classifying one message. `matched` lists the lexicon terms that
 * fired so a tag can always be traced back to its cause.
 */
export type SentimentResult = {
    tag: SentimentTag;
    matched: {
        positive: string[];
        negative: string[];
    };
};

export type SentimentLexicon = {
    positive: string[];
    negative: string[];
};

export type ClassifiedMessage = {
    messageId: string;
    sessionId: string;
    contactId: string;
    direction: Message['direction'];
    date: string;
} & SentimentResult;

export type SentimentMetrics = {
    strategy: string;
    classified: number;
    excluded: number;
    counts: Record<SentimentTag, number>;
    byDirection: Record<'inbound' | 'outbound' | 'unknown', Record<SentimentTag, number>>;
    byDate: Record<string, Record<SentimentTag, number>>;
    sampleNegative: string[];   // message ids
    tags: ClassifiedMessage[];  // one per classified message, in input order
};

export type LoyaltyDistribution = {
    contacts: number;
    counts: Record<LoyaltyTier, number>;
    shares: Record<LoyaltyTier, number>;
};

/**
 * Immutable result of one pipeline run
 */
export type AnalyticsSnapshot = {
    messages: readonly Message[];
    sessions: readonly Session[];
    contacts: readonly Contact[];
    sessionMessages: ReadonlyMap<string, readonly Message[]>;
    report: LoadReport;
    timeZone: string;
};

export type Insight<T> =
    | { status: 'ok'; value: T }
    | { status: 'insufficient-data'; reason: string };

export type OperatorHighlight = {
    operatorId: string;
    sessionCount: number;
};

export type InsightSet = {
    topRatedOperator: Insight<OperatorHighlight & { averageRating: number; ratedSessions: number }>;
    mostEfficientOperator: Insight<OperatorHighlight & { sessionsPerHour: number }>;
    peakHour: Insight<{ hour: number; messages: number }>;
    negativeSentimentRate: Insight<{ rate: number; negative: number; classified: number }>;
    loyaltyDistribution: Insight<LoyaltyDistribution>;
    frequentContactShare: Insight<{ share: number; frequent: number; contacts: number }>;
    dataQuality: {
        rowsLoaded: number;
        rowsSkipped: number;
        missingSources: string[];
        danglingSessionRefs: number;
        warnings: number;
    };
};

/**
 * Full set of results for a range, as handed to the presentation layer
 */
export type AnalysisReport = {
    range: { start: string | null; end: string | null };
    overview: OverviewMetrics;
    volume: VolumeMetrics;
    scorecards: ScorecardMetrics;
    latency: LatencyMetrics;
    closures: ClosureMetrics;
    breakdown: BreakdownMetrics;
    ratings: RatingMetrics;
    sentiment: SentimentMetrics;
    loyalty: LoyaltyDistribution;
    insights: InsightSet;
    headlines: string[];
};
