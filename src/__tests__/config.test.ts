import { describe, it, expect } from 'vitest';

import { getDefaultConfig, loadDefaultStopwords, resolveConfig } from '../utils/config';
import { HEADER_VARIANTS } from '../utils/date.utils';
import { ConfigurationError } from '../utils/errors';
import type { HeaderVariant } from '../types';

function configError(run: () => unknown): ConfigurationError {
    try {
        run();
    } catch (error) {
        if (error instanceof ConfigurationError) return error;
        throw error;
    }
    throw new Error('expected a ConfigurationError');
}

describe('resolveConfig', () => {
    it('should fill in defaults', () => {
        const config = getDefaultConfig();

        expect(config.headerVariants.map(v => v.name)).toEqual(['dash', 'bracket', 'dot', 'iso']);
        expect(config.dateOrder).toBe('auto');
        expect(config.preferredDateOrder).toBe('dmy');
        expect(config.mediaPlaceholders).toEqual(['<Media omitted>']);
        expect(config.dropNumericTokens).toBe(true);
        expect(config.includeSystemInTimelines).toBe(false);
        expect(config.collation).toBe('ordinal');
        expect(config.stopwords).toBe(loadDefaultStopwords());
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('should ship an English stopword list', () => {
        const stopwords = loadDefaultStopwords();

        expect(stopwords.has('the')).toBe(true);
        expect(stopwords.has("don't")).toBe(true);
        expect(stopwords.has('morning')).toBe(false);
    });

    it('should return an already resolved config unchanged', () => {
        const config = resolveConfig({ dateOrder: 'mdy' });
        expect(resolveConfig(config)).toBe(config);
    });

    it('should accept custom variants alongside named ones', () => {
        const custom: HeaderVariant = {
            name: 'spaced',
            pattern: /^(?<p1>\d{1,2}) (?<p2>\d{1,2}) (?<p3>\d{4}) (?<hour>\d{1,2}):(?<minute>\d{2}) \| /,
            fields: 'day-month'
        };
        const config = resolveConfig({ headerVariants: ['iso', custom] });

        expect(config.headerVariants).toEqual([HEADER_VARIANTS.iso, custom]);
    });

    it('should normalise stopwords and trim placeholders', () => {
        const config = resolveConfig({
            stopwords: new Set([' Hello ', 'WORLD']),
            mediaPlaceholders: [' image omitted ']
        });

        expect([...config.stopwords]).toEqual(['hello', 'world']);
        expect(config.mediaPlaceholders).toEqual(['image omitted']);
    });

    it('should turn stopword filtering off with false', () => {
        expect(resolveConfig({ stopwords: false }).stopwords.size).toBe(0);
    });

    it('should reject an unknown variant name', () => {
        const error = configError(() => resolveConfig({ headerVariants: ['dash', 'slashy'] }));

        expect(error.option).toBe('headerVariants');
        expect(error.code).toBe('E_CONFIG');
        expect(error.message).toBe('Invalid option "headerVariants": unknown variant "slashy" (known: dash, bracket, dot, iso)');
    });

    it('should reject an empty variant list', () => {
        expect(configError(() => resolveConfig({ headerVariants: [] })).option).toBe('headerVariants');
    });

    it('should reject an empty stopword collection', () => {
        expect(configError(() => resolveConfig({ stopwords: [] })).option).toBe('stopwords');
        expect(configError(() => resolveConfig({ stopwords: ['  '] })).option).toBe('stopwords');
    });

    it('should reject blank media placeholders', () => {
        expect(configError(() => resolveConfig({ mediaPlaceholders: [] })).option).toBe('mediaPlaceholders');
        expect(configError(() => resolveConfig({ mediaPlaceholders: ['<Media omitted>', ' '] })).option).toBe('mediaPlaceholders');
    });
});
