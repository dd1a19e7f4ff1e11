/**
 * CLI Utilities for console output
 */

// ============================================================================
// BANNER & ICONS
// ============================================================================

export const BANNER = `
╔════════════════════════════════════════════════════════════╗
║                                                            ║
║                     SUPPORT  INSIGHTS                      ║
║                                                            ║
║          Customer Support Log Analytics & Insights         ║
║                                                            ║
╚════════════════════════════════════════════════════════════╝
`;

export const SUCCESS_ICON = "✓";
export const ERROR_ICON = "✗";
export const INFO_ICON = "ℹ";
export const WARNING_ICON = "⚠";

// ============================================================================
// COLOR UTILITIES
// ============================================================================

export const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    gray: '\x1b[90m'
};

export function colorize(text: string, color: keyof typeof colors): string {
    return `${colors[color]}${text}${colors.reset}`;
}

export function formatBytes(bytes: number): string {
    const sizes = ['Bytes', 'KB', 'MB', 'GB'];
    if (bytes === 0) return '0 Bytes';
    const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), sizes.length - 1);
    return Math.round(bytes / Math.pow(1024, i) * 100) / 100 + ' ' + sizes[i];
}

// ============================================================================
// LOADING INDICATOR
// ============================================================================

/**
 * Frame spinner on stdout. Without a TTY it prints the message once instead.
 */
export class LoadingSpinner {
    private interval: NodeJS.Timeout | null = null;
    private frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
    private currentFrame = 0;
    private message: string;

    constructor(message: string) {
        this.message = message;
    }

    start(): void {
        if (!process.stdout.isTTY) {
            console.log(`${colorize('…', 'cyan')} ${this.message}`);
            return;
        }
        process.stdout.write('\x1b[?25l'); // Hide cursor
        this.interval = setInterval(() => {
            process.stdout.write(`\r${colorize(this.frames[this.currentFrame], 'cyan')} ${this.message}`);
            this.currentFrame = (this.currentFrame + 1) % this.frames.length;
        }, 100);
    }

    stop(): void {
        if (!this.interval) return;
        clearInterval(this.interval);
        this.interval = null;
        process.stdout.write('\r' + ' '.repeat(process.stdout.columns) + '\r'); // Clear line
        process.stdout.write('\x1b[?25h'); // Show cursor
    }
}

// ============================================================================
// MESSAGE UTILITIES
// ============================================================================

export function logSuccess(message: string): void {
    console.log(`${colorize(SUCCESS_ICON, 'green')} ${colorize(message, 'green')}`);
}

export function logError(message: string): void {
    console.log(`${colorize(ERROR_ICON, 'red')} ${colorize(message, 'red')}`);
}

export function logInfo(message: string): void {
    console.log(`${colorize(INFO_ICON, 'blue')} ${colorize(message, 'blue')}`);
}

export function logWarning(message: string): void {
    console.log(`${colorize(WARNING_ICON, 'yellow')} ${colorize(message, 'yellow')}`);
}

export function logHeader(message: string): void {
    const line = '═'.repeat(message.length + 4);
    console.log(`\n${colorize(line, 'cyan')}`);
    console.log(`${colorize('  ' + message + '  ', 'cyan')}`);
    console.log(`${colorize(line, 'cyan')}\n`);
}

// ============================================================================
// TABLE UTILITIES
// ============================================================================

export interface TableColumn {
    header: string;
    width: number;
    align?: 'left' | 'right' | 'center';
}

/**
 * Renders rows as a boxed table; cells wider than their column are cut with "..."
 */
export function renderTable(columns: TableColumn[], data: string[][]): string[] {
    const headerRow = columns.map(col => col.header.padEnd(col.width)).join(' │ ');
    const separator = columns.map(col => '─'.repeat(col.width)).join('─┼─');

    const lines = [
        `┌─${separator}─┐`,
        `│ ${colorize(headerRow, 'bright')} │`,
        `├─${separator}─┤`
    ];

    for (const row of data) {
        const formattedRow = columns.map((col, i) => {
            const cell = row[i] ?? '';
            const truncated = cell.length > col.width ? cell.substring(0, col.width - 3) + '...' : cell;

            switch (col.align) {
                case 'right':
                    return truncated.padStart(col.width);
                case 'center':
                    return truncated.padStart(Math.floor((col.width + truncated.length) / 2)).padEnd(col.width);
                default:
                    return truncated.padEnd(col.width);
            }
        }).join(' │ ');

        lines.push(`│ ${formattedRow} │`);
    }

    lines.push(`└─${separator}─┘`);
    return lines;
}

export function createTable(columns: TableColumn[], data: string[][]): void {
    for (const line of renderTable(columns, data)) {
        console.log(line);
    }
}

// ============================================================================
// USAGE & ERRORS
// ============================================================================

export function showUsage(): void {
    console.log(BANNER);

    console.log(`${colorize('USAGE:', 'bright')}`);
    console.log(`  ${colorize('npx tsx src/index.ts', 'cyan')} ${colorize('<data_dir>', 'yellow')} ${colorize('[output.json]', 'dim')} ${colorize('[options]', 'yellow')}`);
    console.log();

    console.log(`${colorize('OPTIONS:', 'bright')}`);
    console.log(`  ${colorize('--from YYYY-MM-DD', 'cyan')}    First day of the range (inclusive)`);
    console.log(`  ${colorize('--to YYYY-MM-DD', 'cyan')}      Last day of the range (inclusive)`);
    console.log(`  ${colorize('--tz <zone>', 'cyan')}          IANA time zone for dates and hours (default: UTC)`);
    console.log(`  ${colorize('--encoding <enc>', 'cyan')}     Character encoding of the exports (default: utf8)`);
    console.log(`  ${colorize('--lexicon <file>', 'cyan')}     Sentiment lexicon JSON (default: config/sentiment-lexicon.json)`);
    console.log(`  ${colorize('--help, -h', 'cyan')}           Show this help message`);
    console.log();

    console.log(`${colorize('INPUT FILES:', 'bright')}`);
    console.log(`  ${colorize('messages.csv', 'green')}                Message log`);
    console.log(`  ${colorize('sessions.csv', 'green')}                Session log`);
    console.log(`  ${colorize('sessions_with_channel.csv', 'green')}   Session log with channel and plugin columns`);
    console.log(`  Other .csv files are matched by their header row.`);
    console.log();

    console.log(`${colorize('EXAMPLES:', 'bright')}`);
    console.log(`  ${colorize('npx tsx src/index.ts ./exports/', 'cyan')}`);
    console.log(`  ${colorize('npx tsx src/index.ts ./exports/ report.json --from 2025-07-01 --to 2025-07-31', 'cyan')}`);
    console.log(`  ${colorize('npx tsx src/index.ts ./exports/ --tz America/Sao_Paulo --encoding latin1', 'cyan')}`);
}

export function showError(message: string, details?: string): void {
    console.log();
    logError(message);
    if (details) {
        console.log(`${colorize('Details:', 'dim')} ${details}`);
    }
    console.log();
    console.log(`${colorize('Run with --help to see usage information.', 'dim')}`);
    console.log();
}
