/**
 * Date Parsing Utilities
 */

import type { Clock, DateOrder, HeaderVariant } from '../types';

// ============================================================================
// HEADER VARIANTS
// ============================================================================

const TIME = String.raw`(?<hour>\d{1,2}):(?<minute>\d{2})(?::(?<sec>\d{2}))?(?:\s*(?<meridiem>[AaPp]\.?[Mm]\.?))?`;

/**
 * Export header conventions, tried in the order a config lists them:
 *   "12/31/20, 7:59 PM - Name: message"     dash
 *   "[31/12/20, 19:59:12] Name: message"     bracket
 *   "31.12.2020, 19:59 - Name: message"      dot
 *   "2020-12-31, 19:59 - Name: message"      iso
 * \s before am/pm also covers the narrow no-break space newer exports use.
 */
export const HEADER_VARIANTS: Readonly<Record<string, HeaderVariant>> = Object.freeze({
    dash: {
        name: 'dash',
        pattern: new RegExp(String.raw`^(?<p1>\d{1,2})\/(?<p2>\d{1,2})\/(?<p3>\d{2,4}),?\s${TIME}\s-\s`),
        fields: 'day-month'
    },
    bracket: {
        name: 'bracket',
        pattern: new RegExp(String.raw`^\[(?<p1>\d{1,2})[\/.](?<p2>\d{1,2})[\/.](?<p3>\d{2,4}),?\s${TIME}\]\s`),
        fields: 'day-month'
    },
    dot: {
        name: 'dot',
        pattern: new RegExp(String.raw`^(?<p1>\d{1,2})\.(?<p2>\d{1,2})\.(?<p3>\d{2,4}),?\s${TIME}\s-\s`),
        fields: 'day-month'
    },
    iso: {
        name: 'iso',
        pattern: new RegExp(String.raw`^(?<p1>\d{4})-(?<p2>\d{1,2})-(?<p3>\d{1,2}),?\s${TIME}\s-\s`),
        fields: 'year-first'
    }
});

/**
 * Raw header fields, before a date order is applied
 */
export type HeaderMatch = {
    variant: HeaderVariant;
    prefixLength: number;
    fields: [number, number, number];
    hour: number;
    minute: number;
    second: number;
    clock: Clock;
    meridiem?: 'AM' | 'PM';
};

/**
 * Tries each variant against the line start, first match wins
 */
export function matchHeader(line: string, variants: readonly HeaderVariant[]): HeaderMatch | null {
    for (const variant of variants) {
        const match = variant.pattern.exec(line);
        const groups = match?.groups;
        if (!match || !groups) {
            continue;
        }

        const { p1, p2, p3, hour, minute, sec, meridiem } = groups;
        if (p1 === undefined || p2 === undefined || p3 === undefined || hour === undefined || minute === undefined) {
            continue;
        }

        return {
            variant,
            prefixLength: match[0].length,
            fields: [parseInt(p1, 10), parseInt(p2, 10), parseInt(p3, 10)],
            hour: parseInt(hour, 10),
            minute: parseInt(minute, 10),
            second: sec ? parseInt(sec, 10) : 0,
            clock: meridiem ? '12h' : '24h',
            meridiem: meridiem ? normaliseMeridiem(meridiem) : undefined
        };
    }

    return null;
}

function normaliseMeridiem(raw: string): 'AM' | 'PM' {
    return raw.replace(/\./g, '').toUpperCase() === 'PM' ? 'PM' : 'AM';
}

// ============================================================================
// TIMESTAMP CONSTRUCTION
// ============================================================================

/**
 * Builds the wall-clock instant for a header under a fixed date order.
 * Returns null when the fields do not form a real date and time; nothing is
 * rolled over or defaulted.
 */
export function parseDateParts(header: HeaderMatch, dateOrder: DateOrder): Date | null {
    const [a, b, c] = header.fields;

    let year: number;
    let month: number;
    let day: number;

    if (header.variant.fields === 'year-first') {
        [year, month, day] = [a, b, c];
    } else if (dateOrder === 'dmy') {
        [day, month, year] = [a, b, c];
    } else {
        [month, day, year] = [a, b, c];
    }

    // Convert 2-digit years to 4-digit (assumes 2000s)
    const fullYear = year < 100 ? 2000 + year : year;

    let hour24 = header.hour;
    if (header.clock === '12h') {
        if (hour24 < 1 || hour24 > 12) {
            return null;
        }
        if (header.meridiem === 'PM' && hour24 < 12) {
            hour24 += 12;
        }
        if (header.meridiem === 'AM' && hour24 === 12) {
            hour24 = 0;
        }
    }

    if (month < 1 || month > 12 || day < 1 || hour24 > 23 || header.minute > 59 || header.second > 59) {
        return null;
    }

    const date = new Date(Date.UTC(fullYear, month - 1, day, hour24, header.minute, header.second));
    date.setUTCFullYear(fullYear); // Date.UTC maps years 0-99 onto 1900-1999

    // 31/02 would roll into March
    if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Votes on day-first vs month-first from fields that can only be a day.
 * Returns null when the headers give no evidence either way or a tie.
 */
export function inferDateOrder(samples: ReadonlyArray<readonly [number, number, number]>): DateOrder | null {
    let dayFirst = 0;
    let monthFirst = 0;

    for (const [first, second] of samples) {
        if (first > 12 && second <= 12) {
            dayFirst += 1;
        } else if (second > 12 && first <= 12) {
            monthFirst += 1;
        }
    }

    if (dayFirst === monthFirst) {
        return null;
    }
    return dayFirst > monthFirst ? 'dmy' : 'mdy';
}

// ============================================================================
// KEYS & FORMATTING
// ============================================================================

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/** YYYY-MM-DD of the wall-clock date */
export function toDateKey(date: Date): string {
    return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/** YYYY-MM of the wall-clock month */
export function toMonthKey(year: number, month: number): string {
    return `${pad(year, 4)}-${pad(month)}`;
}

/** YYYY-MM-DDTHH:mm:ss with no zone suffix, since exports carry no zone */
export function toLocalIso(date: Date): string {
    return `${toDateKey(date)}T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}
