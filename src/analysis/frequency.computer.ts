/**
 * Emoji and Word Frequencies
 */

import type { AnalyserConfig, AnalyserOptions, EmojiCount, Message, WordCount } from '../types';
import { isParticipant } from '../types';
import { resolveConfig } from '../utils/config';
import { assertNonEmpty } from '../utils/errors';

/**
 * Sorts counted entries by count descending. Map iteration order is first
 * appearance and Array#sort is stable, so ties keep that order.
 */
function rankCounts(counts: Map<string, number>, limit?: number): Array<[string, number]> {
    return Array.from(counts.entries())
        .sort((a, b) => b[1] - a[1])
        .slice(0, limit);
}

/**
 * Emoji occurrences across participant messages
 */
export function emojiFrequency(messages: readonly Message[], limit?: number): EmojiCount[] {
    assertNonEmpty(messages);

    const counts = new Map<string, number>();
    for (const m of messages) {
        if (!isParticipant(m.sender)) continue;
        for (const emoji of m.emojis) {
            counts.set(emoji, (counts.get(emoji) ?? 0) + 1);
        }
    }

    return rankCounts(counts, limit).map(([emoji, count]) => ({ emoji, count }));
}

/**
 * Word occurrences across participant, non-media messages. The configured
 * stopwords are applied on top of each message's cached word list.
 */
export function wordFrequency(
    messages: readonly Message[],
    options?: AnalyserOptions | AnalyserConfig,
    limit?: number
): WordCount[] {
    assertNonEmpty(messages);
    const { stopwords } = resolveConfig(options);

    const counts = new Map<string, number>();
    for (const m of messages) {
        if (!isParticipant(m.sender) || m.isMedia) continue;
        for (const word of m.words) {
            if (stopwords.has(word)) continue;
            counts.set(word, (counts.get(word) ?? 0) + 1);
        }
    }

    return rankCounts(counts, limit).map(([word, count]) => ({ word, count }));
}
