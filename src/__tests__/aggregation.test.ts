import { describe, it, expect } from 'vitest';

import {
    activityHeatmap,
    busiestUsers,
    chatTotals,
    computeReport,
    dailyTimeline,
    emojiFrequency,
    filterBySender,
    hourlyActivity,
    monthActivity,
    monthlyTimeline,
    perUserCounts,
    weekdayActivity,
    wordFrequency
} from '../analysis';
import { parseChat } from '../parsers/chat-export.parser';
import { EmptyInputError } from '../utils/errors';

const CHAT = [
    '15/01/2024, 08:05 - Ana: Coffee later? ☕',
    '15/01/2024, 08:06 - Ben: <Media omitted>',
    '15/01/2024, 21:30 - Ben: sure coffee at https://cafe.example 😀',
    '15/01/2024, 21:31 - Ana added Cleo',
    '20/03/2024, 10:00 - Cleo: coffee coffee 😀😀',
    '20/03/2024, 10:01 - Ana: 😀'
].join('\n');

const { messages } = parseChat(CHAT);

describe('per-user counts', () => {
    it('should count messages, words, media, emoji and links per participant', () => {
        expect(perUserCounts(messages)).toEqual([
            { sender: 'Ana', messages: 2, words: 2, media: 0, emojis: 2, links: 0 },
            { sender: 'Ben', messages: 2, words: 5, media: 1, emojis: 1, links: 1 },
            { sender: 'Cleo', messages: 1, words: 2, media: 0, emojis: 2, links: 0 }
        ]);
    });

    it('should break ties by sender under the configured collation', () => {
        const { messages: names } = parseChat('15/01/2024, 08:00 - zoe: a\n15/01/2024, 08:01 - émile: b');

        expect(perUserCounts(names).map(u => u.sender)).toEqual(['zoe', 'émile']);
        expect(perUserCounts(names, { collation: 'locale' }).map(u => u.sender)).toEqual(['émile', 'zoe']);
    });

    it('should rank the busiest users with their share', () => {
        expect(busiestUsers(messages, undefined, 2)).toEqual([
            { sender: 'Ana', messages: 2, percent: 40 },
            { sender: 'Ben', messages: 2, percent: 40 }
        ]);
    });

    it('should total the whole chat', () => {
        expect(chatTotals(messages)).toEqual({
            messages: 5,
            words: 9,
            media: 1,
            emojis: 5,
            links: 1,
            systemMessages: 1,
            participants: 3,
            first: '2024-01-15T08:05:00',
            last: '2024-03-20T10:01:00'
        });
    });

    it('should filter by sender in source order', () => {
        expect(filterBySender(messages, 'Ben').map(m => m.line)).toEqual([2, 3]);
    });
});

describe('timelines', () => {
    it('should count messages per month with empty months filled', () => {
        expect(monthlyTimeline(messages)).toEqual([
            { period: '2024-01', year: 2024, month: 1, count: 3 },
            { period: '2024-02', year: 2024, month: 2, count: 0 },
            { period: '2024-03', year: 2024, month: 3, count: 2 }
        ]);
    });

    it('should count system lines only when asked to', () => {
        const [january] = monthlyTimeline(messages, { includeSystemInTimelines: true });
        expect(january?.count).toBe(4);
    });

    it('should cover every day between the first and last message', () => {
        const days = dailyTimeline(messages);

        expect(days).toHaveLength(66);
        expect(days[0]).toEqual({ date: '2024-01-15', count: 3 });
        expect(days[1]).toEqual({ date: '2024-01-16', count: 0 });
        expect(days[45]).toEqual({ date: '2024-02-29', count: 0 });
        expect(days[65]).toEqual({ date: '2024-03-20', count: 2 });
    });

    it('should return empty timelines when only system lines remain', () => {
        const { messages: system } = parseChat('15/01/2024, 08:00 - Ana added Ben');

        expect(monthlyTimeline(system)).toEqual([]);
        expect(dailyTimeline(system)).toEqual([]);
        expect(perUserCounts(system)).toEqual([]);
    });
});

describe('activity', () => {
    it('should bin messages by weekday and hour with Sunday as row 0', () => {
        const grid = activityHeatmap(messages);

        expect(grid).toHaveLength(7);
        expect(grid.every(row => row.length === 24)).toBe(true);
        expect(grid[1]?.[8]).toBe(2);
        expect(grid[1]?.[21]).toBe(1);
        expect(grid[3]?.[10]).toBe(2);
        expect(grid.flat().reduce((sum, n) => sum + n, 0)).toBe(5);
    });

    it('should place the sample Sunday morning in row 0', () => {
        const { messages: sunday } = parseChat('12/03/23, 9:15 AM - Alice: hi\n12/03/23, 9:16 AM - Bob: <Media omitted>\n12/03/23, 9:17 AM - Alice: bye');
        expect(activityHeatmap(sunday)[0]?.[9]).toBe(3);
    });

    it('should include system lines in the heatmap when asked to', () => {
        expect(activityHeatmap(messages, { includeSystemInTimelines: true })[1]?.[21]).toBe(2);
    });

    it('should produce weekday, month and hour distributions', () => {
        expect(weekdayActivity(messages)).toEqual([0, 3, 0, 2, 0, 0, 0]);
        expect(monthActivity(messages)).toEqual([3, 0, 2, 0, 0, 0, 0, 0, 0, 0, 0, 0]);

        const hours = hourlyActivity(messages);
        expect(hours[8]).toBe(2);
        expect(hours[10]).toBe(2);
        expect(hours[21]).toBe(1);
        expect(hours.reduce((sum, n) => sum + n, 0)).toBe(5);
    });
});

describe('frequencies', () => {
    it('should rank emoji by count', () => {
        expect(emojiFrequency(messages)).toEqual([
            { emoji: '😀', count: 4 },
            { emoji: '☕', count: 1 }
        ]);
    });

    it('should count a multi-person ZWJ sequence once', () => {
        const holdingHands = '\u{1F9D1}\u200D\u{1F91D}\u200D\u{1F9D1}';
        const { messages: hands } = parseChat(`15/01/2024, 08:00 - Ana: ${holdingHands}\n15/01/2024, 08:01 - Ben: ${holdingHands} 😀`);

        expect(emojiFrequency(hands)).toEqual([
            { emoji: holdingHands, count: 2 },
            { emoji: '😀', count: 1 }
        ]);
        expect(perUserCounts(hands).map(u => u.emojis)).toEqual([1, 2]);
    });

    it('should keep first-appearance order for tied emoji', () => {
        const { messages: tied } = parseChat('15/01/2024, 08:00 - Ana: 😀 ☕\n15/01/2024, 08:01 - Ben: ☕ 😀');

        expect(emojiFrequency(tied)).toEqual([
            { emoji: '😀', count: 2 },
            { emoji: '☕', count: 2 }
        ]);
    });

    it('should rank words with ties in first-appearance order', () => {
        expect(wordFrequency(messages)).toEqual([
            { word: 'coffee', count: 4 },
            { word: 'later', count: 1 },
            { word: 'sure', count: 1 },
            { word: 'https', count: 1 },
            { word: 'cafe', count: 1 },
            { word: 'example', count: 1 }
        ]);
        expect(wordFrequency(messages, undefined, 2).map(w => w.word)).toEqual(['coffee', 'later']);
    });

    it('should apply extra stopwords at aggregation time', () => {
        expect(wordFrequency(messages, { stopwords: ['coffee', 'https'] }, 2)).toEqual([
            { word: 'later', count: 1 },
            { word: 'sure', count: 1 }
        ]);
    });
});

describe('report', () => {
    it('should be deterministic', () => {
        expect(computeReport(messages)).toEqual(computeReport(messages));
    });

    it('should apply report limits', () => {
        const report = computeReport(messages, undefined, { topEmojis: 1, topWords: 1, topUsers: 1 });

        expect(report.topEmojis).toEqual([{ emoji: '😀', count: 4 }]);
        expect(report.topWords).toEqual([{ word: 'coffee', count: 4 }]);
        expect(report.busiestUsers.map(u => u.sender)).toEqual(['Ana']);
        expect(report.users).toHaveLength(3);
    });

    it('should reject an empty message sequence everywhere', () => {
        const aggregations = [
            () => perUserCounts([]),
            () => busiestUsers([]),
            () => chatTotals([]),
            () => monthlyTimeline([]),
            () => dailyTimeline([]),
            () => activityHeatmap([]),
            () => emojiFrequency([]),
            () => wordFrequency([]),
            () => computeReport([])
        ];

        for (const run of aggregations) {
            expect(run).toThrow(EmptyInputError);
        }
    });
});
