import type { AnalyserConfig, AnalyserOptions, DailyPoint, Message, MonthlyPoint } from '../types';
import { resolveConfig } from '../utils/config';
import { toDateKey, toMonthKey } from '../utils/date.utils';
import { assertNonEmpty } from '../utils/errors';
import { timeRange, timelineMessages } from './message-filters';

// ============================================================================
// TIME SERIES GENERATION
// ============================================================================

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Messages per calendar month, from the first message's month to the last
 * one's inclusive. Months without messages are present with a zero count.
 */
export function monthlyTimeline(
    messages: readonly Message[],
    options?: AnalyserOptions | AnalyserConfig
): MonthlyPoint[] {
    assertNonEmpty(messages);
    const selected = timelineMessages(messages, resolveConfig(options));
    const range = timeRange(selected);
    if (!range) return [];

    const counts = new Map<string, number>();
    for (const m of selected) {
        const key = toMonthKey(m.timestamp.getUTCFullYear(), m.timestamp.getUTCMonth() + 1);
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    const points: MonthlyPoint[] = [];
    let year = range.first.getUTCFullYear();
    let month = range.first.getUTCMonth() + 1;
    const endYear = range.last.getUTCFullYear();
    const endMonth = range.last.getUTCMonth() + 1;

    while (year < endYear || (year === endYear && month <= endMonth)) {
        const period = toMonthKey(year, month);
        points.push({ period, year, month, count: counts.get(period) ?? 0 });

        month += 1;
        if (month > 12) {
            month = 1;
            year += 1;
        }
    }

    return points;
}

/**
 * Messages per calendar date, zero-filled between the first and last date
 */
export function dailyTimeline(
    messages: readonly Message[],
    options?: AnalyserOptions | AnalyserConfig
): DailyPoint[] {
    assertNonEmpty(messages);
    const selected = timelineMessages(messages, resolveConfig(options));
    const range = timeRange(selected);
    if (!range) return [];

    const counts = new Map<string, number>();
    for (const m of selected) {
        const key = toDateKey(m.timestamp);
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    // Timestamps live in UTC fields, so stepping whole days never hits a DST jump
    const start = Date.UTC(range.first.getUTCFullYear(), range.first.getUTCMonth(), range.first.getUTCDate());
    const end = Date.UTC(range.last.getUTCFullYear(), range.last.getUTCMonth(), range.last.getUTCDate());

    const points: DailyPoint[] = [];
    for (let t = start; t <= end; t += DAY_MS) {
        const date = toDateKey(new Date(t));
        points.push({ date, count: counts.get(date) ?? 0 });
    }

    return points;
}
