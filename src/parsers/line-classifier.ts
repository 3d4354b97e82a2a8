import type { AnalyserConfig, Clock, DateOrder, DetectedFormat, HeaderVariant } from '../types';
import { inferDateOrder, matchHeader, parseDateParts, type HeaderMatch } from '../utils/date.utils';
import { BYTE_ORDER_MARK, LINE_BREAK_SPLIT_REGEX } from '../utils/constants';
import { stripControlMarks } from '../utils/text.utils';

// ============================================================================
// LINE SPLITTING
// ============================================================================

export type SourceLines = {
    /** Physical lines with control marks removed */
    lines: string[];
    /** breaks[i] is the line break that preceded lines[i] ('' for the first line) */
    breaks: string[];
};

/**
 * Splits export text into physical lines, keeping each original line break
 * so multi-line bodies can be rebuilt exactly
 */
export function splitLines(rawText: string): SourceLines {
    const text = rawText.startsWith(BYTE_ORDER_MARK) ? rawText.slice(BYTE_ORDER_MARK.length) : rawText;
    const parts = text.split(LINE_BREAK_SPLIT_REGEX);

    const lines: string[] = [];
    const breaks: string[] = [];
    for (let i = 0; i < parts.length; i += 2) {
        lines.push(stripControlMarks(parts[i] ?? ''));
        breaks.push(i === 0 ? '' : parts[i - 1] ?? '');
    }

    return { lines, breaks };
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

export type LineClass =
    | { kind: 'header'; header: HeaderMatch }
    | { kind: 'continuation' };

export function classifyLine(line: string, variants: readonly HeaderVariant[]): LineClass {
    const header = matchHeader(line, variants);
    return header ? { kind: 'header', header } : { kind: 'continuation' };
}

/**
 * The format a file is committed to. Headers that disagree with it are
 * reported and dropped rather than re-interpreted.
 */
export type CommittedFormat = {
    variant: HeaderVariant;
    clock: Clock;
    dateOrder: DateOrder;
};

function isValidUnderAnyOrder(header: HeaderMatch): boolean {
    return parseDateParts(header, 'dmy') !== null || parseDateParts(header, 'mdy') !== null;
}

/**
 * Commits to the variant and clock of the first header that parses. For
 * day/month variants the date order comes from config, or with 'auto' from
 * the fields of every header of that variant that can only be a day.
 */
export function sniffFormat(lines: readonly string[], config: AnalyserConfig): CommittedFormat | null {
    let committed: { variant: HeaderVariant; clock: Clock } | null = null;
    const samples: Array<[number, number, number]> = [];

    for (const line of lines) {
        const header = matchHeader(line, config.headerVariants);
        if (!header) continue;

        if (!committed) {
            if (!isValidUnderAnyOrder(header)) continue;
            committed = { variant: header.variant, clock: header.clock };
        }

        if (header.variant === committed.variant) {
            samples.push(header.fields);
        }
    }

    if (!committed) {
        return null;
    }

    const dateOrder = config.dateOrder !== 'auto'
        ? config.dateOrder
        : inferDateOrder(samples) ?? config.preferredDateOrder;

    return { ...committed, dateOrder };
}

export function describeFormat(format: CommittedFormat): DetectedFormat {
    return {
        variant: format.variant.name,
        dateOrder: format.variant.fields === 'year-first' ? 'ymd' : format.dateOrder,
        clock: format.clock
    };
}
