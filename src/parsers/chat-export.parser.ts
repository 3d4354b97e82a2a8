import type {
    AnalyserConfig,
    AnalyserOptions,
    Message,
    ParseResult,
    ParseWarning,
    ParseWarningKind,
    Sender
} from '../types';
import { SYSTEM } from '../types';
import { resolveConfig } from '../utils/config';
import { parseDateParts, toLocalIso } from '../utils/date.utils';
import {
    extractEmojis,
    normaliseParticipantName,
    tokeniseWords
} from '../utils/text.utils';
import { classifyLine, describeFormat, sniffFormat, splitLines } from './line-classifier';

// ============================================================================
// CHAT EXPORT PARSER
// ============================================================================

// "Name: text" - the first colon followed by whitespace or end of line
const SENDER_PREFIX_REGEX = /^([^:]+?):(?:\s|$)/;

const TRAILING_BREAKS_REGEX = /(?:\r\n|\n|\r)+$/;

type OpenEntry = {
    line: number;
    timestamp: Date;
    sender: Sender;
    body: string;
};

/**
 * Splits the text after a header into sender and body. No sender-colon
 * means a platform notification.
 */
export function splitSender(rest: string): { sender: Sender; body: string } {
    const match = SENDER_PREFIX_REGEX.exec(rest);
    const name = match?.[1] ? normaliseParticipantName(match[1]) : '';

    if (!match || !name) {
        return { sender: SYSTEM, body: rest };
    }

    return { sender: name, body: rest.slice(match[0].length) };
}

function buildMessage(entry: OpenEntry, config: AnalyserConfig): Message {
    const body = entry.body.replace(TRAILING_BREAKS_REGEX, '');
    const isMedia = entry.sender !== SYSTEM && config.mediaPlaceholders.includes(body.trim());
    const content = isMedia ? '' : body;
    const time = entry.timestamp.getTime();

    return Object.freeze({
        // Date is mutable, so every read gets its own copy
        get timestamp(): Date {
            return new Date(time);
        },
        sender: entry.sender,
        body,
        isMedia,
        emojis: Object.freeze(extractEmojis(content)),
        words: Object.freeze(tokeniseWords(content, {
            stopwords: config.stopwords,
            dropNumericTokens: config.dropNumericTokens,
            placeholders: config.mediaPlaceholders
        })),
        line: entry.line
    });
}

/**
 * Parses a plain-text chat export into messages plus the warnings collected
 * on the way. Malformed lines never throw.
 */
export function parseChat(rawText: string, options?: AnalyserOptions | AnalyserConfig): ParseResult {
    const config = resolveConfig(options);
    const { lines, breaks } = splitLines(rawText);
    const format = sniffFormat(lines, config);

    const messages: Message[] = [];
    const warnings: ParseWarning[] = [];
    let current: OpenEntry | null = null;

    const warn = (kind: ParseWarningKind, line: number, text: string, message: string): void => {
        warnings.push({ kind, line, text, message });
    };

    const flush = (): void => {
        if (!current) return;

        const message = buildMessage(current, config);
        const previous = messages[messages.length - 1];
        if (previous && message.timestamp.getTime() < previous.timestamp.getTime()) {
            warn('out-of-order', message.line, toLocalIso(message.timestamp),
                `Entry at ${toLocalIso(message.timestamp)} is earlier than the one before it (${toLocalIso(previous.timestamp)})`);
        }
        messages.push(message);
        current = null;
    };

    lines.forEach((line, index) => {
        const lineNumber = index + 1;
        const classified = classifyLine(line, config.headerVariants);

        if (classified.kind === 'continuation') {
            if (current) {
                current.body += (breaks[index] ?? '\n') + line;
            } else if (line.trim() !== '') {
                warn('orphan-line', lineNumber, line, 'Line does not start with a timestamp and no entry is open');
            }
            return;
        }

        const { header } = classified;
        flush();

        if (format && (header.variant !== format.variant || header.clock !== format.clock)) {
            warn('format-mismatch', lineNumber, line,
                `Header uses ${header.variant.name}/${header.clock} but the file was detected as ${format.variant.name}/${format.clock}`);
            return;
        }

        const timestamp = format ? parseDateParts(header, format.dateOrder) : null;
        if (!timestamp) {
            warn('invalid-timestamp', lineNumber, line, 'Header timestamp is not a valid date and time');
            return;
        }

        const { sender, body } = splitSender(line.slice(header.prefixLength));
        current = { line: lineNumber, timestamp, sender, body };
    });

    flush();

    return {
        messages: Object.freeze(messages),
        warnings: Object.freeze(warnings),
        format: format ? describeFormat(format) : null
    };
}
