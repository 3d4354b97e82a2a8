/**
 * Constants and Configuration Values
 */

import emojiRegex from "emoji-regex";

// ============================================================================
// ANALYSIS LIMITS
// ============================================================================

export const MAX_TOP_EMOJIS = 20;
export const MAX_TOP_WORDS = 50;
export const MAX_TOP_USERS = 10;
export const MAX_CLI_WARNINGS = 10;

export const HOURS_PER_DAY = 24;
export const DAYS_PER_WEEK = 7;
export const MONTHS_PER_YEAR = 12;

// ============================================================================
// REGEX PATTERNS
// ============================================================================

// Global; matches whole RGI sequences (ZWJ, skin tones, flags, keycaps)
export const EMOJI_REGEX = emojiRegex();

export const LINK_REGEX = /https?:\/\/\S+/ig;

// Control & direction marks often injected by WhatsApp (e.g., U+200E)
export const CONTROL_MARKS_REGEX = /[\u200E\u200F\u202A-\u202E\u2066-\u2069]/g;

export const BYTE_ORDER_MARK = '\uFEFF';

// Separators kept by the line splitter: \r\n, \n or a lone \r
export const LINE_BREAK_SPLIT_REGEX = /(\r\n|\n|\r)/;

// Word characters: letters, marks, digits, apostrophes, underscores
export const NON_WORD_SPLIT_REGEX = /[^\p{L}\p{M}\p{N}'_]+/u;
export const CURLY_APOSTROPHE_REGEX = /[\u2018\u2019\u02BC`]/g;
export const NUMERIC_TOKEN_REGEX = /^[\p{N}_']+$/u;

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_MEDIA_PLACEHOLDERS: readonly string[] = Object.freeze(['<Media omitted>']);
export const DEFAULT_HEADER_VARIANTS: readonly string[] = Object.freeze(['dash', 'bracket', 'dot', 'iso']);
export const DEFAULT_FALLBACK_ENCODING = 'latin1';

export const WEEKDAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
