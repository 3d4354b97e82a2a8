import fs from "node:fs";
import path from "node:path";
import { getDefaultOutputPath, isReadableFile } from '../utils/file.utils';
import { ChatStatsError } from '../utils/errors';
import { MAX_CLI_WARNINGS, WEEKDAY_NAMES } from '../utils/constants';
import { analyseChatFile, type FileAnalysis } from './file-processor';
import { parseCliArgs } from './options';
import {
    BANNER,
    colorize,
    createTable,
    formatBytes,
    formatNumber,
    formatWarning,
    logHeader,
    logInfo,
    logSuccess,
    logWarning,
    showError,
    showUsage
} from './cli.utils';

// ============================================================================
// CLI MAIN LOGIC
// ============================================================================

function printWarnings(analysis: FileAnalysis): void {
    if (analysis.warnings.length === 0) {
        return;
    }

    logWarning(`${formatNumber(analysis.warnings.length)} line(s) could not be used`);
    for (const warning of analysis.warnings.slice(0, MAX_CLI_WARNINGS)) {
        console.log(`  ${colorize(formatWarning(warning), 'dim')}`);
    }
    if (analysis.warnings.length > MAX_CLI_WARNINGS) {
        console.log(`  ${colorize(`... and ${analysis.warnings.length - MAX_CLI_WARNINGS} more (see the JSON report)`, 'dim')}`);
    }
}

function printSummary(analysis: FileAnalysis): void {
    const { report } = analysis;

    logHeader("PARTICIPANTS");
    createTable(
        [
            { header: '#', width: 3, align: 'right' },
            { header: 'Sender', width: 24, align: 'left' },
            { header: 'Messages', width: 9, align: 'right' },
            { header: 'Words', width: 9, align: 'right' },
            { header: 'Media', width: 6, align: 'right' },
            { header: 'Emojis', width: 7, align: 'right' }
        ],
        report.users.map((user, index) => [
            String(index + 1),
            user.sender,
            formatNumber(user.messages),
            formatNumber(user.words),
            formatNumber(user.media),
            formatNumber(user.emojis)
        ])
    );

    const busiestDay = report.weekdayActivity.indexOf(Math.max(...report.weekdayActivity));
    const topEmoji = report.topEmojis[0];
    const topWord = report.topWords[0];

    logHeader("HIGHLIGHTS");
    console.log(`  ${colorize('Period:', 'cyan')} ${report.totals.first} → ${report.totals.last}`);
    console.log(`  ${colorize('Messages:', 'cyan')} ${formatNumber(report.totals.messages)} (+${formatNumber(report.totals.systemMessages)} system)`);
    console.log(`  ${colorize('Busiest weekday:', 'cyan')} ${WEEKDAY_NAMES[busiestDay] ?? '-'}`);
    console.log(`  ${colorize('Top emoji:', 'cyan')} ${topEmoji ? `${topEmoji.emoji} × ${topEmoji.count}` : '-'}`);
    console.log(`  ${colorize('Top word:', 'cyan')} ${topWord ? `${topWord.word} × ${topWord.count}` : '-'}`);
}

/**
 * Main CLI execution function
 */
export async function runCLI(args: string[]): Promise<void> {
    try {
        const options = parseCliArgs(args.slice(2));

        if (options.help || !options.inputPath) {
            showUsage();
            return;
        }

        console.log(BANNER);

        const inputPath = path.resolve(options.inputPath);
        if (!isReadableFile(inputPath)) {
            showError("Input file does not exist", `Path: ${inputPath}`);
            process.exit(1);
        }
        const outputPath = options.outputPath ? path.resolve(options.outputPath) : getDefaultOutputPath(inputPath);

        logInfo(`Reading ${path.basename(inputPath)} (${formatBytes(fs.statSync(inputPath).size)})`);
        const analysis = analyseChatFile(inputPath, options);

        if (analysis.format) {
            logSuccess(`Detected ${analysis.format.variant} headers, ${analysis.format.dateOrder} dates, ${analysis.format.clock} clock (${analysis.encoding})`);
        }
        printWarnings(analysis);
        printSummary(analysis);

        await fs.promises.writeFile(outputPath, JSON.stringify(analysis, null, 2), "utf8");
        console.log();
        logSuccess(`JSON report written: ${outputPath}`);
    } catch (error) {
        if (error instanceof ChatStatsError) {
            showError(error.message);
            process.exit(1);
        }
        throw error;
    }
}
