/**
 * Console View - coloured terminal output for the menu
 */

import { FileRecord } from '../model/file-record';
import { FileKeeperError } from '../errors';

export const ANSI = {
    reset: '\x1b[0m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    cyan: '\x1b[36m',
    bold: '\x1b[1m',
    dim: '\x1b[2m'
};

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const COLUMNS = {
    id: 10,
    name: 28,
    category: 14,
    date: 18,
    path: 30
};

const KIND_LABELS: Record<FileKeeperError['kind'], string> = {
    validation: 'Invalid input',
    duplicate: 'Already exists',
    not_found: 'Not found',
    storage: 'Storage error',
    corruption: 'Registry corrupted'
};

/**
 * dd-MMM-yyyy HH:mm, local time
 */
export function formatDisplayDate(date: Date): string {
    const day = String(date.getDate()).padStart(2, '0');
    const hours = String(date.getHours()).padStart(2, '0');
    const minutes = String(date.getMinutes()).padStart(2, '0');
    return `${day}-${MONTHS[date.getMonth()]}-${date.getFullYear()} ${hours}:${minutes}`;
}

export function truncate(text: string, max: number): string {
    if (text.length <= max) {
        return text;
    }
    return text.substring(0, max - 3) + '...';
}

export function padCell(text: string, width: number): string {
    if (text.length >= width) {
        return text.substring(0, width);
    }
    return `  ${text}`.padEnd(width);
}

export function displayBanner(title: string): void {
    const width = 70;
    const inner = width - 2;
    const left = Math.max(0, Math.floor((inner - title.length) / 2));
    const right = Math.max(0, inner - left - title.length);

    console.log('');
    console.log(`${ANSI.cyan}${ANSI.bold}╔${'═'.repeat(inner)}╗${ANSI.reset}`);
    console.log(`${ANSI.cyan}${ANSI.bold}║${' '.repeat(left)}${title}${' '.repeat(right)}║${ANSI.reset}`);
    console.log(`${ANSI.cyan}${ANSI.bold}╚${'═'.repeat(inner)}╝${ANSI.reset}`);
}

export function displaySubHeader(text: string): void {
    console.log(`${ANSI.yellow}${ANSI.bold}\n  ── ${text} ──${ANSI.reset}`);
}

export function displaySeparator(): void {
    console.log(`${ANSI.dim}  ${'─'.repeat(66)}${ANSI.reset}`);
}

export function success(message: string): void {
    console.log(`${ANSI.green}${ANSI.bold}  [OK]  ${message}${ANSI.reset}`);
}

export function error(message: string): void {
    console.log(`${ANSI.red}${ANSI.bold}  [!!]  ${message}${ANSI.reset}`);
}

export function info(message: string): void {
    console.log(`${ANSI.cyan}  [i]   ${message}${ANSI.reset}`);
}

export function warning(message: string): void {
    console.log(`${ANSI.yellow}  [!]   ${message}${ANSI.reset}`);
}

export function displayFailure(failure: FileKeeperError): void {
    error(`${KIND_LABELS[failure.kind]}: ${failure.message}`);
    if (failure.partiallyApplied) {
        warning('The change was applied on disk but is not yet recorded in the registry.');
    }
}

export function displayRecordTable(records: FileRecord[]): void {
    if (records.length === 0) {
        warning('No files found.');
        return;
    }

    const ruleWidth = COLUMNS.id + COLUMNS.name + COLUMNS.category + COLUMNS.date + COLUMNS.path + 4;

    console.log('');
    console.log(ANSI.bold + ANSI.cyan +
        padCell('ID', COLUMNS.id) +
        padCell('File Name', COLUMNS.name) +
        padCell('Category', COLUMNS.category) +
        padCell('Created', COLUMNS.date) +
        padCell('Path', COLUMNS.path) + ANSI.reset);
    console.log(`${ANSI.dim}  ${'─'.repeat(ruleWidth)}${ANSI.reset}`);

    for (const record of records) {
        console.log(
            padCell(record.shortId, COLUMNS.id) +
            ANSI.green + padCell(truncate(record.fileName, COLUMNS.name - 2), COLUMNS.name) + ANSI.reset +
            padCell(truncate(record.category, COLUMNS.category - 2), COLUMNS.category) +
            ANSI.dim + padCell(formatDisplayDate(record.createdAt), COLUMNS.date) +
            padCell(truncate(record.storagePath, COLUMNS.path - 2), COLUMNS.path) + ANSI.reset
        );
    }
    console.log('');
}

export function displayRecordDetail(record: FileRecord): void {
    const label = (text: string) => `${ANSI.bold}  ${text.padEnd(11)}: ${ANSI.reset}`;

    console.log('');
    displaySubHeader('File Details');
    console.log(label('ID') + record.id);
    console.log(label('File Name') + ANSI.green + record.fileName + ANSI.reset);
    console.log(label('Category') + record.category);
    console.log(label('Path') + record.storagePath);
    console.log(label('Created') + formatDisplayDate(record.createdAt));
    console.log(label('Updated') + formatDisplayDate(record.updatedAt));
    console.log(`${ANSI.bold}  Content    :${ANSI.reset}`);
    displaySeparator();
    displayContent(record.content);
    displaySeparator();
}

export function displayContent(content: string): void {
    for (const line of content.split('\n')) {
        console.log(`    ${line}`);
    }
}
