/**
 * Message and Parse Result Type Definitions
 */

/**
 * Sentinel sender for notifications generated by the chat platform itself
 * ("X added Y", "Messages are end-to-end encrypted", ...)
 */
export const SYSTEM: unique symbol = Symbol.for('chatlog-stats.system');

export type Sender = string | typeof SYSTEM;

/**
 * A single logical chat entry. Immutable once the parser has produced it.
 */
export type Message = {
    /**
     * Wall-clock time of the entry; timezone-naive, read through the UTC
     * getters. Parsed messages hand out a fresh copy on every read.
     */
    readonly timestamp: Date;
    readonly sender: Sender;
    /** Full text, multi-line bodies joined with their original line breaks */
    readonly body: string;
    readonly isMedia: boolean;
    readonly emojis: readonly string[];
    /** Lower-cased tokens with stopwords, numeric tokens and placeholders removed */
    readonly words: readonly string[];
    /** 1-based line number of the entry's header in the source text */
    readonly line: number;
};

export type ParseWarningKind =
    | "orphan-line"
    | "format-mismatch"
    | "invalid-timestamp"
    | "out-of-order";

/**
 * Non-fatal problem found while parsing. Accumulated, never thrown.
 */
export type ParseWarning = {
    kind: ParseWarningKind;
    line: number;
    text: string;
    message: string;
};

export type DateOrder = 'dmy' | 'mdy';
export type Clock = '12h' | '24h';

/**
 * The header format a file was committed to after sniffing its first header
 */
export type DetectedFormat = {
    variant: string;
    dateOrder: DateOrder | 'ymd';
    clock: Clock;
};

export type ParseResult = {
    messages: readonly Message[];
    warnings: readonly ParseWarning[];
    format: DetectedFormat | null;
};

export function isSystemMessage(message: Message): boolean {
    return message.sender === SYSTEM;
}

/**
 * Narrows a sender to a participant name
 */
export function isParticipant(sender: Sender): sender is string {
    return typeof sender === 'string';
}
