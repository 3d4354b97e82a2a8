/**
 * Report Assembly
 */

import type { AnalyserConfig, AnalyserOptions, ChatReport, Message, ReportOptions } from '../types';
import { resolveConfig } from '../utils/config';
import { MAX_TOP_EMOJIS, MAX_TOP_USERS, MAX_TOP_WORDS } from '../utils/constants';
import { assertNonEmpty } from '../utils/errors';
import { activityHeatmap, hourlyActivity, monthActivity, weekdayActivity } from './activity.computer';
import { emojiFrequency, wordFrequency } from './frequency.computer';
import { dailyTimeline, monthlyTimeline } from './time-series.generator';
import { busiestUsers, chatTotals, perUserCounts } from './user-stats.computer';

/**
 * Runs every aggregation over the same message sequence and collects the
 * results into one JSON-friendly object for a rendering collaborator
 */
export function computeReport(
    messages: readonly Message[],
    options?: AnalyserOptions | AnalyserConfig,
    reportOptions: ReportOptions = {}
): ChatReport {
    assertNonEmpty(messages);
    const config = resolveConfig(options);

    return {
        totals: chatTotals(messages),
        users: perUserCounts(messages, config),
        busiestUsers: busiestUsers(messages, config, reportOptions.topUsers ?? MAX_TOP_USERS),
        monthlyTimeline: monthlyTimeline(messages, config),
        dailyTimeline: dailyTimeline(messages, config),
        activityHeatmap: activityHeatmap(messages, config),
        weekdayActivity: weekdayActivity(messages, config),
        monthActivity: monthActivity(messages, config),
        hourlyActivity: hourlyActivity(messages, config),
        topEmojis: emojiFrequency(messages, reportOptions.topEmojis ?? MAX_TOP_EMOJIS),
        topWords: wordFrequency(messages, config, reportOptions.topWords ?? MAX_TOP_WORDS)
    };
}
