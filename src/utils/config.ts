/**
 * Configuration Resolution
 */

import fs from "node:fs";
import type { AnalyserConfig, AnalyserOptions, Collation, HeaderVariant } from '../types';
import { HEADER_VARIANTS } from './date.utils';
import { DEFAULT_HEADER_VARIANTS, DEFAULT_MEDIA_PLACEHOLDERS } from './constants';
import { ConfigurationError } from './errors';

const DATE_ORDERS = ['auto', 'dmy', 'mdy'] as const;
const COLLATIONS: readonly Collation[] = ['ordinal', 'locale'];

const RESOLVED = new WeakSet<object>();

let defaultStopwords: ReadonlySet<string> | null = null;

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Loads the bundled English stopword list once
 */
export function loadDefaultStopwords(): ReadonlySet<string> {
    if (!defaultStopwords) {
        const raw: unknown = JSON.parse(
            fs.readFileSync(new URL('../data/stopwords-en.json', import.meta.url), 'utf8')
        );
        if (!isStringArray(raw)) {
            throw new ConfigurationError('stopwords', 'bundled stopword list is not an array of strings');
        }
        defaultStopwords = Object.freeze(new Set(raw.map(word => word.toLowerCase())));
    }
    return defaultStopwords;
}

function resolveVariants(requested: ReadonlyArray<string | HeaderVariant>): HeaderVariant[] {
    if (requested.length === 0) {
        throw new ConfigurationError('headerVariants', 'at least one header variant is required');
    }

    return requested.map(entry => {
        if (typeof entry !== 'string') {
            return entry;
        }
        const variant = HEADER_VARIANTS[entry];
        if (!variant) {
            const known = Object.keys(HEADER_VARIANTS).join(', ');
            throw new ConfigurationError('headerVariants', `unknown variant "${entry}" (known: ${known})`);
        }
        return variant;
    });
}

function resolveStopwords(stopwords: AnalyserOptions['stopwords']): ReadonlySet<string> {
    if (stopwords === undefined) {
        return loadDefaultStopwords();
    }
    if (stopwords === false) {
        return new Set();
    }

    const set = new Set<string>();
    for (const word of stopwords) {
        const normalised = word.trim().toLowerCase();
        if (normalised) set.add(normalised);
    }
    if (set.size === 0) {
        throw new ConfigurationError('stopwords', 'stopword set is empty; pass false to disable filtering');
    }
    return set;
}

function resolvePlaceholders(placeholders: readonly string[]): string[] {
    if (placeholders.length === 0 || placeholders.some(p => p.trim() === '')) {
        throw new ConfigurationError('mediaPlaceholders', 'placeholders must be non-empty strings');
    }
    return placeholders.map(p => p.trim());
}

/**
 * Validates options and fills in defaults. The result is frozen and safe to
 * share between the parser and every aggregation.
 */
export function resolveConfig(options: AnalyserOptions | AnalyserConfig = {}): AnalyserConfig {
    if (isResolvedConfig(options)) {
        return options;
    }

    const dateOrder = options.dateOrder ?? 'auto';
    if (!DATE_ORDERS.some(order => order === dateOrder)) {
        throw new ConfigurationError('dateOrder', `expected one of ${DATE_ORDERS.join(', ')}`);
    }

    const preferredDateOrder = options.preferredDateOrder ?? 'dmy';
    if (preferredDateOrder !== 'dmy' && preferredDateOrder !== 'mdy') {
        throw new ConfigurationError('preferredDateOrder', 'expected dmy or mdy');
    }

    const collation = options.collation ?? 'ordinal';
    if (!COLLATIONS.includes(collation)) {
        throw new ConfigurationError('collation', `expected one of ${COLLATIONS.join(', ')}`);
    }

    const config: AnalyserConfig = {
        headerVariants: Object.freeze(resolveVariants(options.headerVariants ?? DEFAULT_HEADER_VARIANTS)),
        dateOrder,
        preferredDateOrder,
        mediaPlaceholders: Object.freeze(resolvePlaceholders(options.mediaPlaceholders ?? DEFAULT_MEDIA_PLACEHOLDERS)),
        stopwords: resolveStopwords(options.stopwords),
        dropNumericTokens: options.dropNumericTokens ?? true,
        includeSystemInTimelines: options.includeSystemInTimelines ?? false,
        collation
    };

    RESOLVED.add(config);
    return Object.freeze(config);
}

function isResolvedConfig(value: AnalyserOptions | AnalyserConfig): value is AnalyserConfig {
    return RESOLVED.has(value);
}

export function getDefaultConfig(): AnalyserConfig {
    return resolveConfig();
}
