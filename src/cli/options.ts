import fs from "node:fs";
import type { AnalyserOptions } from '../types';
import { ConfigurationError } from '../utils/errors';

export type CliOptions = {
    help: boolean;
    inputPath?: string;
    outputPath?: string;
    user?: string;
    encoding?: string;
    stopwordsFile?: string;
    analyser: AnalyserOptions;
};

function takeValue(args: readonly string[], index: number, flag: string): string {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
        throw new ConfigurationError(flag, 'expects a value');
    }
    return value;
}

/**
 * Parses CLI arguments (without the node/script prefix) into options
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
    const options: CliOptions = { help: false, analyser: {} };
    const positional: string[] = [];
    const media: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i] ?? '';

        switch (arg) {
            case '--help':
            case '-h':
                options.help = true;
                break;
            case '--date-order': {
                const value = takeValue(args, i++, arg);
                if (value !== 'auto' && value !== 'dmy' && value !== 'mdy') {
                    throw new ConfigurationError(arg, `expected auto, dmy or mdy, got "${value}"`);
                }
                options.analyser.dateOrder = value;
                break;
            }
            case '--variants':
                options.analyser.headerVariants = takeValue(args, i++, arg)
                    .split(',')
                    .map(name => name.trim())
                    .filter(Boolean);
                break;
            case '--media':
                media.push(takeValue(args, i++, arg));
                break;
            case '--stopwords':
                options.stopwordsFile = takeValue(args, i++, arg);
                break;
            case '--no-stopwords':
                options.analyser.stopwords = false;
                break;
            case '--keep-numbers':
                options.analyser.dropNumericTokens = false;
                break;
            case '--include-system':
                options.analyser.includeSystemInTimelines = true;
                break;
            case '--user':
                options.user = takeValue(args, i++, arg);
                break;
            case '--encoding':
                options.encoding = takeValue(args, i++, arg);
                break;
            default:
                if (arg.startsWith('-')) {
                    throw new ConfigurationError(arg, 'unknown flag');
                }
                positional.push(arg);
        }
    }

    if (positional.length > 2) {
        throw new ConfigurationError('arguments', `expected at most 2 paths, got ${positional.length}`);
    }
    [options.inputPath, options.outputPath] = positional;

    if (media.length > 0) {
        options.analyser.mediaPlaceholders = media;
    }
    if (options.stopwordsFile && options.analyser.stopwords === false) {
        throw new ConfigurationError('--stopwords', 'cannot be combined with --no-stopwords');
    }

    return options;
}

/**
 * Reads a stopword file: one word per line, blank lines and # comments ignored
 */
export function readStopwordsFile(filePath: string): string[] {
    return fs.readFileSync(filePath, 'utf8')
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line !== '' && !line.startsWith('#'));
}
