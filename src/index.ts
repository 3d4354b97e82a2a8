/**
 * chatlog-stats - Main Entry Point
 *
 * Parses plain-text chat exports into typed messages and computes the
 * statistics a chart or word-cloud renderer needs.
 *
 * Usage:
 *  npx tsx src/index.ts path/to/chat.txt [output.json] [options]
 */

import { fileURLToPath } from "node:url";
import path from "node:path";
import { runCLI } from './cli';

// ============================================================================
// MAIN ENTRY POINT
// ============================================================================

/**
 * Checks if this script is being run directly (not imported as a module)
 */
function isMainModule(): boolean {
    const thisFile = fileURLToPath(import.meta.url);
    return !!process.argv[1] && path.resolve(process.argv[1]) === thisFile;
}

// Run CLI if this is the main module
if (isMainModule()) {
    runCLI(process.argv).catch((error: unknown) => {
        console.error("❌ Unexpected error:", error);
        process.exit(1);
    });
}

// ============================================================================
// LIBRARY EXPORTS
// ============================================================================

export * from './types';
export * from './parsers';
export * from './analysis';
export * from './utils';
export * from './cli';
