/**
 * Aggregation Output Type Definitions
 */

export type UserCounts = {
    sender: string;
    messages: number;
    words: number;
    media: number;
    emojis: number;
    links: number;
};

export type BusiestUser = {
    sender: string;
    messages: number;
    percent: number;   // share of all participant messages, 2 decimals
};

export type MonthlyPoint = {
    period: string;    // YYYY-MM
    year: number;
    month: number;     // 1-12
    count: number;
};

export type DailyPoint = {
    date: string;      // YYYY-MM-DD
    count: number;
};

/** 7x24 grid, rows indexed by weekday (0=Sunday), columns by hour */
export type Heatmap = number[][];

export type EmojiCount = { emoji: string; count: number };
export type WordCount = { word: string; count: number };

export type ChatTotals = {
    messages: number;
    words: number;
    media: number;
    emojis: number;
    links: number;
    systemMessages: number;
    participants: number;
    first: string;     // ISO-like wall-clock timestamp
    last: string;
};

/**
 * Everything the rendering side needs, as plain JSON-friendly structures
 */
export type ChatReport = {
    totals: ChatTotals;
    users: UserCounts[];
    busiestUsers: BusiestUser[];
    monthlyTimeline: MonthlyPoint[];
    dailyTimeline: DailyPoint[];
    activityHeatmap: Heatmap;
    weekdayActivity: number[];
    monthActivity: number[];
    hourlyActivity: number[];
    topEmojis: EmojiCount[];
    topWords: WordCount[];
};

export type ReportOptions = {
    topEmojis?: number;
    topWords?: number;
    topUsers?: number;
};
