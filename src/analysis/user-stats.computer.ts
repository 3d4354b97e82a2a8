/**
 * Per-user Counts
 */

import type { AnalyserConfig, AnalyserOptions, BusiestUser, ChatTotals, Message, UserCounts } from '../types';
import { isParticipant } from '../types';
import { resolveConfig } from '../utils/config';
import { toLocalIso } from '../utils/date.utils';
import { assertNonEmpty } from '../utils/errors';
import { countLinks } from '../utils/text.utils';
import { compareSenders, listParticipants, timeRange } from './message-filters';

// ============================================================================
// USER STATISTICS
// ============================================================================

/**
 * Message, word, media, emoji and link totals for every participant, ranked
 * busiest first: message count descending, then sender name ascending.
 */
export function perUserCounts(
    messages: readonly Message[],
    options?: AnalyserOptions | AnalyserConfig
): UserCounts[] {
    assertNonEmpty(messages);
    const config = resolveConfig(options);

    const byUser = new Map<string, UserCounts>();

    for (const m of messages) {
        if (!isParticipant(m.sender)) continue;

        let counts = byUser.get(m.sender);
        if (!counts) {
            counts = { sender: m.sender, messages: 0, words: 0, media: 0, emojis: 0, links: 0 };
            byUser.set(m.sender, counts);
        }

        counts.messages += 1;
        counts.words += m.words.length;
        counts.emojis += m.emojis.length;
        if (m.isMedia) {
            counts.media += 1;
        } else {
            counts.links += countLinks(m.body);
        }
    }

    const bySender = compareSenders(config.collation);
    return Array.from(byUser.values())
        .sort((a, b) => b.messages - a.messages || bySender(a.sender, b.sender));
}

/**
 * Busiest participants with their share of all participant messages
 */
export function busiestUsers(
    messages: readonly Message[],
    options?: AnalyserOptions | AnalyserConfig,
    limit?: number
): BusiestUser[] {
    const ranked = perUserCounts(messages, options);
    const total = ranked.reduce((sum, user) => sum + user.messages, 0);

    return ranked.slice(0, limit).map(user => ({
        sender: user.sender,
        messages: user.messages,
        percent: total > 0 ? Math.round((user.messages / total) * 10000) / 100 : 0
    }));
}

/**
 * Whole-chat totals over participant messages
 */
export function chatTotals(messages: readonly Message[]): ChatTotals {
    assertNonEmpty(messages);

    const totals = { messages: 0, words: 0, media: 0, emojis: 0, links: 0, systemMessages: 0 };

    for (const m of messages) {
        if (!isParticipant(m.sender)) {
            totals.systemMessages += 1;
            continue;
        }
        totals.messages += 1;
        totals.words += m.words.length;
        totals.emojis += m.emojis.length;
        if (m.isMedia) {
            totals.media += 1;
        } else {
            totals.links += countLinks(m.body);
        }
    }

    const range = timeRange(messages);

    return {
        ...totals,
        participants: listParticipants(messages).length,
        first: range ? toLocalIso(range.first) : '',
        last: range ? toLocalIso(range.last) : ''
    };
}
