/**
 * Error Types
 */

import type { Message } from '../types';

export class ChatStatsError extends Error {
    readonly code: string;

    constructor(code: string, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Raised at setup time for options that cannot be honoured
 */
export class ConfigurationError extends ChatStatsError {
    readonly option: string;

    constructor(option: string, message: string) {
        super('E_CONFIG', `Invalid option "${option}": ${message}`);
        this.option = option;
    }
}

/**
 * Raised when there are no messages to aggregate
 */
export class EmptyInputError extends ChatStatsError {
    constructor(message = 'No valid messages were parsed from the input') {
        super('E_EMPTY_INPUT', message);
    }
}

/**
 * Rejects an empty message sequence; every aggregation starts with this
 */
export function assertNonEmpty(messages: readonly Message[]): void {
    if (messages.length === 0) {
        throw new EmptyInputError();
    }
}
