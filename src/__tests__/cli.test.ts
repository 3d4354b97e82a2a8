import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';

import { formatBytes, formatWarning, renderTable } from '../cli/cli.utils';
import { analyseChatFile } from '../cli/file-processor';
import { parseCliArgs, readStopwordsFile } from '../cli/options';
import { ConfigurationError } from '../utils/errors';

describe('parseCliArgs', () => {
    it('should read paths and analyser flags', () => {
        const options = parseCliArgs([
            'chat.txt', 'out.json',
            '--date-order', 'mdy',
            '--variants', 'dash, iso',
            '--media', 'IMG', '--media', 'VID',
            '--keep-numbers', '--include-system',
            '--user', 'Ana',
            '--encoding', 'win1252'
        ]);

        expect(options).toEqual({
            help: false,
            inputPath: 'chat.txt',
            outputPath: 'out.json',
            user: 'Ana',
            encoding: 'win1252',
            analyser: {
                dateOrder: 'mdy',
                headerVariants: ['dash', 'iso'],
                mediaPlaceholders: ['IMG', 'VID'],
                dropNumericTokens: false,
                includeSystemInTimelines: true
            }
        });
    });

    it('should recognise help without a path', () => {
        const options = parseCliArgs(['-h']);

        expect(options.help).toBe(true);
        expect(options.inputPath).toBeUndefined();
    });

    it('should reject bad input', () => {
        expect(() => parseCliArgs(['--bogus'])).toThrow(ConfigurationError);
        expect(() => parseCliArgs(['chat.txt', '--date-order', 'ymd'])).toThrow('expected auto, dmy or mdy, got "ymd"');
        expect(() => parseCliArgs(['chat.txt', '--user'])).toThrow('Invalid option "--user": expects a value');
        expect(() => parseCliArgs(['a', 'b', 'c'])).toThrow('expected at most 2 paths, got 3');
        expect(() => parseCliArgs(['a', '--stopwords', 'w.txt', '--no-stopwords'])).toThrow(ConfigurationError);
    });
});

describe('cli.utils', () => {
    it('should render a box table and truncate wide cells', () => {
        const lines = renderTable(
            [{ header: 'Name', width: 4 }, { header: 'N', width: 2, align: 'right' }],
            [['Ana', '7'], ['Bartholomew', '12']]
        );

        expect(lines).toEqual([
            '┌──────┬────┐',
            '│ Name │ N  │',
            '├──────┼────┤',
            '│ Ana  │  7 │',
            '│ B... │ 12 │',
            '└──────┴────┘'
        ]);
    });

    it('should describe warnings and sizes', () => {
        expect(formatWarning({ kind: 'orphan-line', line: 4, text: 'x', message: 'no entry is open' }))
            .toBe('line 4 [orphan-line] no entry is open');
        expect(formatBytes(0)).toBe('0 Bytes');
        expect(formatBytes(1536)).toBe('1.5 KB');
    });
});

describe('analyseChatFile', () => {
    let dir = '';

    beforeAll(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chatlog-stats-'));
    });

    afterAll(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should decode, parse and report one file', () => {
        const file = path.join(dir, 'latin.txt');
        fs.writeFileSync(file, Buffer.from('15/01/2024, 08:05 - Zoé: café time\n15/01/2024, 08:06 - Ana: yes', 'latin1'));

        const analysis = analyseChatFile(file, parseCliArgs([file]));

        expect(analysis.encoding).toBe('latin1');
        expect(analysis.participants).toEqual(['Zoé', 'Ana']);
        expect(analysis.report.totals.messages).toBe(2);
        expect(analysis.report.topWords).toEqual([
            { word: 'café', count: 1 },
            { word: 'time', count: 1 },
            { word: 'yes', count: 1 }
        ]);
    });

    it('should use a stopword file and narrow to one user', () => {
        const file = path.join(dir, 'chat.txt');
        const stopwords = path.join(dir, 'stop.txt');
        fs.writeFileSync(file, '15/01/2024, 08:05 - Ana: the cat sat\n15/01/2024, 08:06 - Ben: a dog', 'utf8');
        fs.writeFileSync(stopwords, '# custom\nsat\n\ndog\n', 'utf8');

        expect(readStopwordsFile(stopwords)).toEqual(['sat', 'dog']);

        const analysis = analyseChatFile(file, parseCliArgs([file, '--stopwords', stopwords, '--user', 'Ana']));

        expect(analysis.encoding).toBe('utf8');
        expect(analysis.user).toBe('Ana');
        expect(analysis.participants).toEqual(['Ana', 'Ben']);
        expect(analysis.report.topWords).toEqual([
            { word: 'the', count: 1 },
            { word: 'cat', count: 1 }
        ]);
    });
});
