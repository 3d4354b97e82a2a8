/**
 * File Utilities
 */

import fs from "node:fs";
import path from "node:path";
import iconv from 'iconv-lite';
import { DEFAULT_FALLBACK_ENCODING } from './constants';
import { ConfigurationError } from './errors';

// ============================================================================
// DECODING
// ============================================================================

export type DecodedText = {
    text: string;
    encoding: string;
};

/**
 * Decodes raw export bytes. UTF-8 is tried first (a BOM makes it certain);
 * if that produces replacement characters the fallback encoding is used.
 */
export function decodeChatBuffer(buffer: Buffer, fallbackEncoding: string = DEFAULT_FALLBACK_ENCODING): DecodedText {
    if (!iconv.encodingExists(fallbackEncoding)) {
        throw new ConfigurationError('encoding', `unsupported encoding "${fallbackEncoding}"`);
    }

    const hasBom = buffer.length >= 3 && buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf;
    const utf8 = iconv.decode(buffer, 'utf8');

    if (hasBom || !utf8.includes('\uFFFD')) {
        return { text: utf8, encoding: 'utf8' };
    }

    return { text: iconv.decode(buffer, fallbackEncoding), encoding: fallbackEncoding };
}

/**
 * Reads a chat export from disk
 */
export function readChatFile(filePath: string, fallbackEncoding?: string): DecodedText {
    return decodeChatBuffer(fs.readFileSync(filePath), fallbackEncoding);
}

/**
 * Checks the path names an existing regular file
 */
export function isReadableFile(filePath: string): boolean {
    return fs.existsSync(filePath) && fs.statSync(filePath).isFile();
}

/**
 * Generates default output path based on input file path
 */
export function getDefaultOutputPath(inputPath: string): string {
    const absolutePath = path.resolve(inputPath);
    const pathInfo = path.parse(absolutePath);
    return path.join(pathInfo.dir, `${pathInfo.name}.stats.json`);
}
