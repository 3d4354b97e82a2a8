/**
 * Configuration Type Definitions
 */

import type { DateOrder } from './message.types';

/**
 * One recognised timestamp-header convention. New locale formats are added
 * by appending a variant, not by touching the parser.
 */
export type HeaderVariant = {
    name: string;
    /**
     * Anchored at line start, with named groups `p1`, `p2`, `p3` (the date
     * fields in line order), `hour`, `minute` and optionally `sec` and `meridiem`
     */
    pattern: RegExp;
    /** 'day-month' when the first two date fields are day and month in some order */
    fields: 'day-month' | 'year-first';
};

export type Collation = 'ordinal' | 'locale';

/**
 * Caller-facing options; every field is optional
 */
export type AnalyserOptions = {
    headerVariants?: ReadonlyArray<string | HeaderVariant>;
    dateOrder?: DateOrder | 'auto';
    preferredDateOrder?: DateOrder;
    mediaPlaceholders?: readonly string[];
    /** `false` turns stopword filtering off; an empty collection is rejected */
    stopwords?: Iterable<string> | false;
    dropNumericTokens?: boolean;
    includeSystemInTimelines?: boolean;
    collation?: Collation;
};

/**
 * Validated, frozen configuration passed into the parser and every aggregation
 */
export type AnalyserConfig = {
    readonly headerVariants: readonly HeaderVariant[];
    readonly dateOrder: DateOrder | 'auto';
    readonly preferredDateOrder: DateOrder;
    readonly mediaPlaceholders: readonly string[];
    readonly stopwords: ReadonlySet<string>;
    readonly dropNumericTokens: boolean;
    readonly includeSystemInTimelines: boolean;
    readonly collation: Collation;
};
