import { Clock, FileRecord, systemClock } from '../model/file-record';
import { corruptionError } from '../errors';
import { FIELD_DELIMITER } from '../utils/constants';

/**
 * Line codec for the registry file.
 *
 * One record per line:
 *
 *   id|fileName|storagePath|category|createdAt|updatedAt|content
 *
 * Only the content field is escaped (backslash, LF, CR and the delimiter).
 * The other fields are written verbatim, so they must not contain `|` or
 * line breaks. Timestamps are local time, second precision,
 * `YYYY-MM-DDTHH:MM:SS`.
 */

const FIELD_COUNT = 7;
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

const ESCAPES: Record<string, string> = {
    '\\': '\\\\',
    '\n': '\\n',
    '\r': '\\r',
    [FIELD_DELIMITER]: '\\p'
};

const UNESCAPES: Record<string, string> = {
    '\\': '\\',
    n: '\n',
    r: '\r',
    p: FIELD_DELIMITER
};

function pad(value: number, width: number = 2): string {
    return String(value).padStart(width, '0');
}

export function formatTimestamp(date: Date): string {
    return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
        `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Parse a `YYYY-MM-DDTHH:MM:SS` local timestamp.
 * Returns null for anything that is not a real calendar date/time.
 */
export function parseTimestamp(text: string): Date | null {
    const match = TIMESTAMP_PATTERN.exec(text);
    if (!match) {
        return null;
    }

    const [year, month, day, hours, minutes, seconds] = match.slice(1).map(Number);
    const date = new Date(year, month - 1, day, hours, minutes, seconds);

    // Reject rollovers such as 2024-02-30 or 25:00:00
    if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day ||
        date.getHours() !== hours || date.getMinutes() !== minutes || date.getSeconds() !== seconds) {
        return null;
    }
    return date;
}

export function escapeContent(content: string): string {
    // \\ first so that introduced backslashes are not escaped twice
    return content
        .replace(/\\/g, ESCAPES['\\'])
        .replace(/\n/g, ESCAPES['\n'])
        .replace(/\r/g, ESCAPES['\r'])
        .split(FIELD_DELIMITER).join(ESCAPES[FIELD_DELIMITER]);
}

/**
 * Reverse of escapeContent. A single left-to-right scan, so `\\p` decodes to
 * `\p` rather than `\|`. Unknown sequences are kept as written.
 */
export function unescapeContent(escaped: string): string {
    let result = '';
    for (let i = 0; i < escaped.length; i++) {
        const char = escaped[i];
        if (char === '\\' && i + 1 < escaped.length) {
            const replacement = UNESCAPES[escaped[i + 1]];
            if (replacement !== undefined) {
                result += replacement;
                i++;
                continue;
            }
        }
        result += char;
    }
    return result;
}

export function encodeRecord(record: FileRecord): string {
    return [
        record.id,
        record.fileName,
        record.storagePath,
        record.category,
        formatTimestamp(record.createdAt),
        formatTimestamp(record.updatedAt),
        escapeContent(record.content)
    ].join(FIELD_DELIMITER);
}

/**
 * Split at the first six delimiters only; the content field keeps anything
 * after that verbatim.
 */
function splitFields(line: string): string[] {
    const fields: string[] = [];
    let start = 0;

    while (fields.length < FIELD_COUNT - 1) {
        const index = line.indexOf(FIELD_DELIMITER, start);
        if (index === -1) {
            break;
        }
        fields.push(line.substring(start, index));
        start = index + FIELD_DELIMITER.length;
    }
    fields.push(line.substring(start));
    return fields;
}

export function decodeRecord(line: string, clock: Clock = systemClock): FileRecord {
    const fields = splitFields(line);
    if (fields.length < FIELD_COUNT) {
        throw corruptionError(`Corrupt registry line (expected ${FIELD_COUNT} fields, found ${fields.length}): ${line}`);
    }

    const [id, fileName, storagePath, category, createdText, updatedText] = fields
        .slice(0, FIELD_COUNT - 1)
        .map(field => field.trim());

    const createdAt = parseTimestamp(createdText);
    const updatedAt = parseTimestamp(updatedText);
    if (!createdAt || !updatedAt) {
        throw corruptionError(`Cannot parse date in registry line: ${line}`);
    }

    return new FileRecord({
        id,
        fileName,
        storagePath,
        category,
        createdAt,
        updatedAt,
        content: unescapeContent(fields[FIELD_COUNT - 1])
    }, clock);
}
