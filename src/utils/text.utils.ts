/**
 * Text Processing Utilities
 */

import {
    CONTROL_MARKS_REGEX,
    CURLY_APOSTROPHE_REGEX,
    EMOJI_REGEX,
    LINK_REGEX,
    NON_WORD_SPLIT_REGEX,
    NUMERIC_TOKEN_REGEX
} from './constants';

// ============================================================================
// TEXT PROCESSING
// ============================================================================

/**
 * Removes control and direction marks from text that WhatsApp often injects
 */
export function stripControlMarks(text: string): string {
    return text.replace(CONTROL_MARKS_REGEX, "");
}

/**
 * Normalises participant display names by collapsing any run of whitespace
 * characters (including non-breaking/narrow no-break spaces) into a single
 * ASCII space and trimming leading/trailing spaces.
 */
export function normaliseParticipantName(name: string): string {
    return name
        .replace(/[\u00A0\u202F\u2007]/g, ' ') // NBSP, NNBSP, figure space
        .replace(/\s+/g, ' ')
        .trim();
}

export type TokeniseOptions = {
    stopwords: ReadonlySet<string>;
    dropNumericTokens: boolean;
    /** Literal strings removed from the text before splitting */
    placeholders?: readonly string[];
};

/**
 * Tokenises text into lower-cased words, keeping contractions like don't
 */
export function tokeniseWords(text: string, options: TokeniseOptions): string[] {
    let cleaned = text;
    for (const placeholder of options.placeholders ?? []) {
        cleaned = cleaned.split(placeholder).join(' ');
    }

    const tokens = cleaned
        .toLowerCase()
        .replace(CURLY_APOSTROPHE_REGEX, "'")
        .split(NON_WORD_SPLIT_REGEX);

    const words: string[] = [];
    for (const raw of tokens) {
        const token = raw.replace(/^'+|'+$/g, '');
        if (!token) continue;
        if (options.dropNumericTokens && NUMERIC_TOKEN_REGEX.test(token)) continue;
        if (options.stopwords.has(token)) continue;
        words.push(token);
    }

    return words;
}

/**
 * Collects emoji sequences in order of appearance, duplicates kept
 */
export function extractEmojis(text: string): string[] {
    return Array.from(text.matchAll(EMOJI_REGEX), match => match[0]);
}

export function countLinks(text: string): number {
    return (text.match(LINK_REGEX) || []).length;
}
