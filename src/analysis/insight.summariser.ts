/**
 * Insight Summarisation
 *
 * Reduces the metric and classifier results for a range to a fixed set of
 * headline facts. A fact without enough qualifying records is reported as
 * `insufficient-data` instead of a made-up value.
 */

import type {
    Insight,
    InsightSet,
    LoadReport,
    LoyaltyDistribution,
    OperatorScorecard,
    ScorecardMetrics,
    SentimentMetrics,
    VolumeMetrics
} from '../types';
import {
    DEFAULT_MIN_CLASSIFIED,
    DEFAULT_MIN_CONTACTS,
    DEFAULT_MIN_EFFICIENCY_SESSIONS,
    DEFAULT_MIN_MESSAGES,
    DEFAULT_MIN_RATED_SESSIONS
} from '../utils/constants';
import { formatHour, formatNumber, formatPercent } from '../utils/format.utils';

export type InsightOptions = {
    minRatedSessions?: number;        // per operator, for top-rated
    minEfficiencySessions?: number;   // per operator, timed sessions for most-efficient
    minMessages?: number;             // for peak hour
    minClassified?: number;           // for negative rate
    minContacts?: number;             // for loyalty figures
};

export type InsightInputs = {
    scorecards: ScorecardMetrics;
    volume: VolumeMetrics;
    sentiment: SentimentMetrics;
    loyalty: LoyaltyDistribution;
    report: LoadReport;
};

function ok<T>(value: T): Insight<T> {
    return { status: 'ok', value };
}

function insufficient<T>(reason: string): Insight<T> {
    return { status: 'insufficient-data', reason };
}

/**
 * Highest metric wins; ties go to more sessions, then the smaller id
 */
function pickOperator(
    cards: readonly OperatorScorecard[],
    metric: (card: OperatorScorecard) => number | undefined
): { card: OperatorScorecard; value: number } | undefined {
    let best: { card: OperatorScorecard; value: number } | undefined;

    for (const card of cards) {
        const value = metric(card);
        if (value === undefined) continue;
        if (
            !best ||
            value > best.value ||
            (value === best.value && card.sessionCount > best.card.sessionCount) ||
            (value === best.value && card.sessionCount === best.card.sessionCount && card.operatorId < best.card.operatorId)
        ) {
            best = { card, value };
        }
    }

    return best;
}

// ============================================================================
// INDIVIDUAL FACTS
// ============================================================================

export function findTopRatedOperator(
    scorecards: ScorecardMetrics,
    minRatedSessions: number = DEFAULT_MIN_RATED_SESSIONS
): InsightSet['topRatedOperator'] {
    const eligible = scorecards.operators.filter(card => card.ratedSessions >= Math.max(1, minRatedSessions));
    const best = pickOperator(eligible, card => card.averageRating);
    if (!best) {
        return insufficient(`no operator has at least ${minRatedSessions} rated session(s)`);
    }
    return ok({
        operatorId: best.card.operatorId,
        sessionCount: best.card.sessionCount,
        averageRating: best.value,
        ratedSessions: best.card.ratedSessions
    });
}

export function findMostEfficientOperator(
    scorecards: ScorecardMetrics,
    minEfficiencySessions: number = DEFAULT_MIN_EFFICIENCY_SESSIONS
): InsightSet['mostEfficientOperator'] {
    const eligible = scorecards.operators.filter(card => card.timedSessions >= Math.max(1, minEfficiencySessions));
    const best = pickOperator(eligible, card => card.sessionsPerHour);
    if (!best) {
        return insufficient(`no operator has at least ${minEfficiencySessions} session(s) with a positive duration`);
    }
    return ok({
        operatorId: best.card.operatorId,
        sessionCount: best.card.sessionCount,
        sessionsPerHour: best.value
    });
}

/**
 * Busiest hour of day; the earliest hour wins a tie
 */
export function findPeakHour(
    volume: VolumeMetrics,
    minMessages: number = DEFAULT_MIN_MESSAGES
): InsightSet['peakHour'] {
    if (volume.totals.total === 0 || volume.totals.total < minMessages) {
        return insufficient(`fewer than ${minMessages} message(s) in range`);
    }

    let hour = 0;
    volume.hourlyHistogram.forEach((bin, index) => {
        if (bin.total > volume.hourlyHistogram[hour].total) hour = index;
    });

    return ok({ hour, messages: volume.hourlyHistogram[hour].total });
}

export function computeNegativeRate(
    sentiment: SentimentMetrics,
    minClassified: number = DEFAULT_MIN_CLASSIFIED
): InsightSet['negativeSentimentRate'] {
    if (sentiment.classified === 0 || sentiment.classified < minClassified) {
        return insufficient(`fewer than ${minClassified} classified message(s)`);
    }
    return ok({
        rate: sentiment.counts.negative / sentiment.classified,
        negative: sentiment.counts.negative,
        classified: sentiment.classified
    });
}

function enoughContacts(loyalty: LoyaltyDistribution, minContacts: number): boolean {
    return loyalty.contacts > 0 && loyalty.contacts >= minContacts;
}

// ============================================================================
// INSIGHT SET
// ============================================================================

export function summariseInsights(inputs: InsightInputs, options: InsightOptions = {}): InsightSet {
    const { scorecards, volume, sentiment, loyalty, report } = inputs;
    const minContacts = options.minContacts ?? DEFAULT_MIN_CONTACTS;

    const rowsLoaded = report.sources.reduce((total, source) => total + source.rows, 0);
    const rowsSkipped = report.sources.reduce((total, source) => total + source.skipped, 0);
    const sourceWarnings = report.sources.reduce((total, source) => total + source.warnings.length, 0);

    return {
        topRatedOperator: findTopRatedOperator(scorecards, options.minRatedSessions),
        mostEfficientOperator: findMostEfficientOperator(scorecards, options.minEfficiencySessions),
        peakHour: findPeakHour(volume, options.minMessages),
        negativeSentimentRate: computeNegativeRate(sentiment, options.minClassified),
        loyaltyDistribution: enoughContacts(loyalty, minContacts)
            ? ok(loyalty)
            : insufficient(`fewer than ${minContacts} contact(s)`),
        frequentContactShare: enoughContacts(loyalty, minContacts)
            ? ok({ share: loyalty.shares.frequent, frequent: loyalty.counts.frequent, contacts: loyalty.contacts })
            : insufficient(`fewer than ${minContacts} contact(s)`),
        dataQuality: {
            rowsLoaded,
            rowsSkipped,
            missingSources: report.sources.filter(s => s.status === 'missing').map(s => s.source),
            danglingSessionRefs: report.danglingSessionRefs,
            warnings: sourceWarnings + report.warnings.length
        }
    };
}

/**
 * One readable line per fact, in a fixed order
 */
export function formatInsights(insights: InsightSet): string[] {
    const lines: string[] = [];

    const top = insights.topRatedOperator;
    lines.push(top.status === 'ok'
        ? `Top rated operator: ${top.value.operatorId} (${top.value.averageRating.toFixed(2)} stars over ${formatNumber(top.value.ratedSessions)} rated sessions)`
        : `Top rated operator: insufficient data (${top.reason})`);

    const efficient = insights.mostEfficientOperator;
    lines.push(efficient.status === 'ok'
        ? `Most efficient operator: ${efficient.value.operatorId} (${efficient.value.sessionsPerHour.toFixed(2)} sessions per hour)`
        : `Most efficient operator: insufficient data (${efficient.reason})`);

    const peak = insights.peakHour;
    lines.push(peak.status === 'ok'
        ? `Peak hour: ${formatHour(peak.value.hour)} (${formatNumber(peak.value.messages)} messages)`
        : `Peak hour: insufficient data (${peak.reason})`);

    const negative = insights.negativeSentimentRate;
    lines.push(negative.status === 'ok'
        ? `Negative sentiment: ${formatPercent(negative.value.rate)} of ${formatNumber(negative.value.classified)} classified messages`
        : `Negative sentiment: insufficient data (${negative.reason})`);

    const loyalty = insights.loyaltyDistribution;
    if (loyalty.status === 'ok') {
        const { counts } = loyalty.value;
        lines.push(`Contacts by loyalty: ${counts.single} single, ${counts.occasional} occasional, ${counts.regular} regular, ${counts.frequent} frequent`);
    } else {
        lines.push(`Contacts by loyalty: insufficient data (${loyalty.reason})`);
    }

    const frequent = insights.frequentContactShare;
    if (frequent.status === 'ok') {
        lines.push(`Frequent contacts: ${formatPercent(frequent.value.share)} of ${formatNumber(frequent.value.contacts)}`);
    }

    const quality = insights.dataQuality;
    lines.push(`Data quality: ${formatNumber(quality.rowsLoaded)} rows loaded, ${formatNumber(quality.rowsSkipped)} skipped, ${formatNumber(quality.danglingSessionRefs)} dangling session references`);
    if (quality.missingSources.length > 0) {
        lines.push(`Missing sources: ${quality.missingSources.join(', ')}`);
    }

    return lines;
}
