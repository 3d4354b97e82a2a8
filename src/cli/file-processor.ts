import type { ChatReport, DetectedFormat, ParseWarning } from '../types';
import { ChatAnalyser } from '../analysis/chat-analyser';
import { readChatFile } from '../utils/file.utils';
import { readStopwordsFile, type CliOptions } from './options';

// ============================================================================
// FILE PROCESSING
// ============================================================================

export type FileAnalysis = {
    source: string;
    encoding: string;
    format: DetectedFormat | null;
    participants: string[];
    user?: string;
    warnings: ParseWarning[];
    report: ChatReport;
};

/**
 * Reads, parses and aggregates one export file
 */
export function analyseChatFile(inputPath: string, options: CliOptions): FileAnalysis {
    const { text, encoding } = readChatFile(inputPath, options.encoding);

    const analyserOptions = options.stopwordsFile
        ? { ...options.analyser, stopwords: readStopwordsFile(options.stopwordsFile) }
        : options.analyser;

    const analyser = ChatAnalyser.fromText(text, analyserOptions);
    const scoped = options.user ? analyser.forSender(options.user) : analyser;

    return {
        source: inputPath,
        encoding,
        format: analyser.format,
        participants: analyser.participants,
        user: options.user,
        warnings: [...analyser.warnings],
        report: scoped.report()
    };
}
