import type { AnalyserConfig, Collation, Message } from '../types';
import { isParticipant } from '../types';

/**
 * Messages written by participants, system notifications excluded
 */
export function participantMessages(messages: readonly Message[]): Message[] {
    return messages.filter(m => isParticipant(m.sender));
}

/**
 * Messages that count towards timelines and heatmaps under the given config
 */
export function timelineMessages(messages: readonly Message[], config: AnalyserConfig): readonly Message[] {
    return config.includeSystemInTimelines ? messages : participantMessages(messages);
}

/**
 * The sub-sequence written by one sender, in source order
 */
export function filterBySender(messages: readonly Message[], sender: string): Message[] {
    return messages.filter(m => m.sender === sender);
}

/**
 * Distinct participant names in order of first message
 */
export function listParticipants(messages: readonly Message[]): string[] {
    const seen = new Set<string>();
    for (const m of messages) {
        if (isParticipant(m.sender)) seen.add(m.sender);
    }
    return Array.from(seen);
}

export function compareSenders(collation: Collation): (a: string, b: string) => number {
    if (collation === 'locale') {
        return (a, b) => a.localeCompare(b);
    }
    return (a, b) => (a < b ? -1 : a > b ? 1 : 0);
}

/**
 * Earliest and latest timestamps; out-of-order input means the ends of the
 * sequence are not necessarily the extremes
 */
export function timeRange(messages: readonly Message[]): { first: Date; last: Date } | null {
    let first: Date | null = null;
    let last: Date | null = null;

    for (const m of messages) {
        if (!first || m.timestamp.getTime() < first.getTime()) first = m.timestamp;
        if (!last || m.timestamp.getTime() > last.getTime()) last = m.timestamp;
    }

    return first && last ? { first, last } : null;
}
