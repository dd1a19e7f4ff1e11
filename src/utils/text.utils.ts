/**
 * Text Processing Utilities
 */

import GraphemeSplitter from "grapheme-splitter";
import { CONTROL_MARKS_REGEX, EMOJI_REGEX } from './constants';

// ============================================================================
// TEXT PROCESSING
// ============================================================================

const GRAPHEME_SPLITTER = new GraphemeSplitter();

/**
 * Removes control and direction marks that chat widgets inject into content
 */
export function stripControlMarks(text: string): string {
    return text.replace(CONTROL_MARKS_REGEX, "");
}

/**
 * Collapses any run of whitespace (including NBSP / NNBSP) into one space
 */
export function normaliseWhitespace(text: string): string {
    return text
        .replace(/[\u00A0\u202F\u2007]/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Turns a free-form label into a vocabulary key:
 * "Closed by Operator" -> "closed_by_operator"
 */
export function toVocabularyKey(text: string): string {
    return normaliseWhitespace(stripControlMarks(text))
        .toLowerCase()
        .replace(/[\s-]+/g, '_');
}

/**
 * Returns a trimmed value, or null for blank cells
 */
export function blankToNull(value: string | undefined): string | null {
    if (value === undefined) return null;
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
}

/**
 * Counts user-perceived characters rather than UTF-16 code units
 */
export function countGraphemes(text: string): number {
    return GRAPHEME_SPLITTER.countGraphemes(text);
}

/**
 * Counts the number of emojis in text using proper grapheme splitting
 */
export function countEmojis(text: string): number {
    const clusters = GRAPHEME_SPLITTER.splitGraphemes(text);
    let count = 0;

    for (const cluster of clusters) {
        EMOJI_REGEX.lastIndex = 0;
        if (EMOJI_REGEX.test(cluster)) {
            count += 1;
        }
    }

    return count;
}

/**
 * Lower-cases text for lexicon matching
 */
export function foldCase(text: string): string {
    return stripControlMarks(text).toLowerCase();
}
