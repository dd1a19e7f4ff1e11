/**
 * Keyword Sentiment Classification
 *
 * Sentiment is produced through the `SentimentStrategy` seam so a statistical
 * model can replace the lexicon without touching the metrics or insight code.
 */

import fs from "node:fs";
import type {
    ClassifiedMessage,
    DateRange,
    Message,
    SentimentLexicon,
    SentimentMetrics,
    SentimentResult,
    SentimentTag
} from '../types';
import { DEFAULT_LEXICON_PATH, MAX_NEGATIVE_SAMPLES } from '../utils/constants';
import { foldCase } from '../utils/text.utils';
import { filterMessages } from './range.filter';

export interface SentimentStrategy {
    readonly name: string;
    classify(content: string): SentimentResult;
}

// ============================================================================
// LEXICON
// ============================================================================

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Validates a parsed lexicon document: `{ "positive": [...], "negative": [...] }`
 */
export function parseLexicon(data: unknown, source = 'lexicon'): SentimentLexicon {
    if (typeof data !== 'object' || data === null) {
        throw new Error(`${source}: expected an object with "positive" and "negative" lists`);
    }
    const positive: unknown = Reflect.get(data, 'positive');
    const negative: unknown = Reflect.get(data, 'negative');
    if (!isStringArray(positive) || !isStringArray(negative)) {
        throw new Error(`${source}: "positive" and "negative" must be lists of strings`);
    }
    return { positive, negative };
}

/**
 * Reads a lexicon JSON file (defaults to config/sentiment-lexicon.json)
 */
export function loadLexicon(filePath: string = DEFAULT_LEXICON_PATH): SentimentLexicon {
    const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    return parseLexicon(data, filePath);
}

function prepareTerms(terms: readonly string[]): string[] {
    const seen = new Set<string>();
    for (const term of terms) {
        const folded = foldCase(term).trim();
        if (folded) seen.add(folded);
    }
    return Array.from(seen);
}

// ============================================================================
// LEXICON STRATEGY
// ============================================================================

/**
 * Case-insensitive substring matching against positive and negative terms.
 * Any negative term wins; a positive term alone gives `positive`; no match
 * is `neutral`.
 */
export class LexiconSentimentStrategy implements SentimentStrategy {
    readonly name = 'lexicon';
    private readonly positive: string[];
    private readonly negative: string[];

    constructor(lexicon: SentimentLexicon) {
        this.positive = prepareTerms(lexicon.positive);
        this.negative = prepareTerms(lexicon.negative);
    }

    static fromFile(filePath: string = DEFAULT_LEXICON_PATH): LexiconSentimentStrategy {
        return new LexiconSentimentStrategy(loadLexicon(filePath));
    }

    classify(content: string): SentimentResult {
        const text = foldCase(content);
        const matched = {
            positive: this.positive.filter(term => text.includes(term)),
            negative: this.negative.filter(term => text.includes(term))
        };

        let tag: SentimentTag = 'neutral';
        if (matched.negative.length > 0) {
            tag = 'negative';
        } else if (matched.positive.length > 0) {
            tag = 'positive';
        }

        return { tag, matched };
    }
}

// ============================================================================
// MESSAGE CLASSIFICATION
// ============================================================================

/**
 * Only messages with textual content take part: files, events and blank
 * messages get no tag at all
 */
export function isClassifiable(message: Pick<Message, 'type' | 'content'>): boolean {
    if (message.type === 'file' || message.type === 'event') return false;
    return message.content.trim().length > 0;
}

export function classifyMessage(message: Message, strategy: SentimentStrategy): SentimentResult | undefined {
    return isClassifiable(message) ? strategy.classify(message.content) : undefined;
}

export function classifyMessages(messages: readonly Message[], strategy: SentimentStrategy): ClassifiedMessage[] {
    const classified: ClassifiedMessage[] = [];
    for (const message of messages) {
        const result = classifyMessage(message, strategy);
        if (!result) continue;
        classified.push({
            messageId: message.messageId,
            sessionId: message.sessionId,
            contactId: message.contactId,
            direction: message.direction,
            date: message.date,
            ...result
        });
    }
    return classified;
}

function emptyTags(): Record<SentimentTag, number> {
    return { positive: 0, neutral: 0, negative: 0 };
}

/**
 * Per-message tags plus their counts overall, per direction and per date for
 * the selected range
 */
export function computeSentiment(
    messages: readonly Message[],
    strategy: SentimentStrategy,
    range?: DateRange
): SentimentMetrics {
    const selected = filterMessages(messages, range);
    const classified = classifyMessages(selected, strategy);

    const counts = emptyTags();
    const byDirection = { inbound: emptyTags(), outbound: emptyTags(), unknown: emptyTags() };
    const byDate: Record<string, Record<SentimentTag, number>> = {};
    const sampleNegative: string[] = [];

    for (const c of classified) {
        counts[c.tag] += 1;
        byDirection[c.direction][c.tag] += 1;
        if (!byDate[c.date]) byDate[c.date] = emptyTags();
        byDate[c.date][c.tag] += 1;
        if (c.tag === 'negative' && sampleNegative.length < MAX_NEGATIVE_SAMPLES) {
            sampleNegative.push(c.messageId);
        }
    }

    return {
        strategy: strategy.name,
        classified: classified.length,
        excluded: selected.length - classified.length,
        counts,
        byDirection,
        byDate,
        sampleNegative,
        tags: classified
    };
}
