/**
 * Activity Distributions
 */

import type { AnalyserConfig, AnalyserOptions, Heatmap, Message } from '../types';
import { resolveConfig } from '../utils/config';
import { DAYS_PER_WEEK, HOURS_PER_DAY, MONTHS_PER_YEAR } from '../utils/constants';
import { assertNonEmpty } from '../utils/errors';
import { timelineMessages } from './message-filters';

function zeros(length: number): number[] {
    return new Array<number>(length).fill(0);
}

function selectMessages(
    messages: readonly Message[],
    options?: AnalyserOptions | AnalyserConfig
): readonly Message[] {
    assertNonEmpty(messages);
    return timelineMessages(messages, resolveConfig(options));
}

/**
 * 7x24 grid of message counts: row = weekday (0=Sunday), column = hour
 */
export function activityHeatmap(
    messages: readonly Message[],
    options?: AnalyserOptions | AnalyserConfig
): Heatmap {
    const grid = Array.from({ length: DAYS_PER_WEEK }, () => zeros(HOURS_PER_DAY));

    for (const m of selectMessages(messages, options)) {
        const row = grid[m.timestamp.getUTCDay()];
        if (row) row[m.timestamp.getUTCHours()] += 1;
    }

    return grid;
}

/** Message count by day of week (7 bins, 0=Sunday) */
export function weekdayActivity(
    messages: readonly Message[],
    options?: AnalyserOptions | AnalyserConfig
): number[] {
    const bins = zeros(DAYS_PER_WEEK);
    for (const m of selectMessages(messages, options)) {
        bins[m.timestamp.getUTCDay()] += 1;
    }
    return bins;
}

/** Message count by calendar month regardless of year (12 bins, 0=January) */
export function monthActivity(
    messages: readonly Message[],
    options?: AnalyserOptions | AnalyserConfig
): number[] {
    const bins = zeros(MONTHS_PER_YEAR);
    for (const m of selectMessages(messages, options)) {
        bins[m.timestamp.getUTCMonth()] += 1;
    }
    return bins;
}

/** Message count by hour of day (24 bins) */
export function hourlyActivity(
    messages: readonly Message[],
    options?: AnalyserOptions | AnalyserConfig
): number[] {
    const bins = zeros(HOURS_PER_DAY);
    for (const m of selectMessages(messages, options)) {
        bins[m.timestamp.getUTCHours()] += 1;
    }
    return bins;
}
