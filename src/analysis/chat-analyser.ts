import type {
    AnalyserConfig,
    AnalyserOptions,
    BusiestUser,
    ChatReport,
    ChatTotals,
    DailyPoint,
    DetectedFormat,
    EmojiCount,
    Heatmap,
    Message,
    MonthlyPoint,
    ParseResult,
    ParseWarning,
    ReportOptions,
    UserCounts,
    WordCount
} from '../types';
import { parseChat } from '../parsers/chat-export.parser';
import { resolveConfig } from '../utils/config';
import { EmptyInputError } from '../utils/errors';
import { activityHeatmap } from './activity.computer';
import { emojiFrequency, wordFrequency } from './frequency.computer';
import { filterBySender, listParticipants } from './message-filters';
import { computeReport } from './report.computer';
import { dailyTimeline, monthlyTimeline } from './time-series.generator';
import { busiestUsers, chatTotals, perUserCounts } from './user-stats.computer';

type Source =
    | { kind: 'text'; text: string }
    | { kind: 'parsed'; result: ParseResult };

/**
 * Parses an export once and answers repeated aggregation calls from the
 * cached message sequence
 */
export class ChatAnalyser {
    readonly config: AnalyserConfig;
    private source: Source;

    private constructor(source: Source, config: AnalyserConfig) {
        this.source = source;
        this.config = config;
    }

    static fromText(text: string, options?: AnalyserOptions | AnalyserConfig): ChatAnalyser {
        return new ChatAnalyser({ kind: 'text', text }, resolveConfig(options));
    }

    static fromMessages(messages: readonly Message[], options?: AnalyserOptions | AnalyserConfig): ChatAnalyser {
        const result: ParseResult = { messages, warnings: [], format: null };
        return new ChatAnalyser({ kind: 'parsed', result }, resolveConfig(options));
    }

    private parsed(): ParseResult {
        if (this.source.kind === 'parsed') {
            return this.source.result;
        }
        const result = parseChat(this.source.text, this.config);
        this.source = { kind: 'parsed', result };
        return result;
    }

    get messages(): readonly Message[] {
        return this.parsed().messages;
    }

    get warnings(): readonly ParseWarning[] {
        return this.parsed().warnings;
    }

    get format(): DetectedFormat | null {
        return this.parsed().format;
    }

    get participants(): string[] {
        return listParticipants(this.messages);
    }

    /**
     * An analyser over one participant's messages
     */
    forSender(sender: string): ChatAnalyser {
        const messages = filterBySender(this.messages, sender);
        if (messages.length === 0) {
            throw new EmptyInputError(`No messages from "${sender}"`);
        }
        return ChatAnalyser.fromMessages(messages, this.config);
    }

    totals(): ChatTotals {
        return chatTotals(this.messages);
    }

    perUserCounts(): UserCounts[] {
        return perUserCounts(this.messages, this.config);
    }

    busiestUsers(limit?: number): BusiestUser[] {
        return busiestUsers(this.messages, this.config, limit);
    }

    monthlyTimeline(): MonthlyPoint[] {
        return monthlyTimeline(this.messages, this.config);
    }

    dailyTimeline(): DailyPoint[] {
        return dailyTimeline(this.messages, this.config);
    }

    activityHeatmap(): Heatmap {
        return activityHeatmap(this.messages, this.config);
    }

    emojiFrequency(limit?: number): EmojiCount[] {
        return emojiFrequency(this.messages, limit);
    }

    wordFrequency(limit?: number): WordCount[] {
        return wordFrequency(this.messages, this.config, limit);
    }

    report(options?: ReportOptions): ChatReport {
        return computeReport(this.messages, this.config, options);
    }
}
