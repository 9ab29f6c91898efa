/**
 * File Name Validator
 *
 * Checks a bare file name (no directory part) before a file is created or
 * renamed. The registry itself never validates names; the command layer
 * calls this first so a bad name causes no side effects.
 *
 * **Rules:**
 * - not empty or whitespace-only
 * - none of `< > : " / \ | ? *`
 * - no line breaks
 * - contains an extension separator (`.`)
 *
 * The `|` rule also keeps names safe for the registry line format, which
 * does not escape the fileName field.
 *
 * **Usage Example:**
 * ```typescript
 * const result = validateFileName('notes.txt');
 * if (!result.isValid) {
 *   console.error(result.error);
 * }
 *
 * // or, inside code that returns FileKeeperError on failure
 * assertValidFileName(input); // throws kind 'validation'
 * ```
 *
 * @module validation/file-name-validator
 */

import { validationError } from '../errors';
import { ILLEGAL_FILE_NAME_CHARS } from '../utils/constants';

export interface FileNameValidationResult {
    /** Whether the name passed every check */
    isValid: boolean;
    /** Human-readable reason (if invalid) */
    error?: string;
}

/**
 * Validates a file name against the rules above.
 *
 * @example
 * ```typescript
 * validateFileName('report.md');   // { isValid: true }
 * validateFileName('a<b>.txt');    // error: 'File name contains illegal characters: <>'
 * validateFileName('README');      // error: 'File name must include an extension (e.g. notes.txt).'
 * ```
 */
export function validateFileName(name: string | null | undefined): FileNameValidationResult {
    if (name === null || name === undefined || name.trim() === '') {
        return { isValid: false, error: 'File name cannot be empty.' };
    }

    const illegal = Array.from(name).filter(char => ILLEGAL_FILE_NAME_CHARS.includes(char));
    if (illegal.length > 0) {
        return { isValid: false, error: `File name contains illegal characters: ${illegal.join('')}` };
    }

    if (/[\r\n]/.test(name)) {
        return { isValid: false, error: 'File name cannot contain line breaks.' };
    }

    if (!name.includes('.')) {
        return { isValid: false, error: 'File name must include an extension (e.g. notes.txt).' };
    }

    return { isValid: true };
}

/**
 * @throws FileKeeperError of kind 'validation' when the name is rejected
 */
export function assertValidFileName(name: string | null | undefined): void {
    const result = validateFileName(name);
    if (!result.isValid) {
        throw validationError(result.error ?? 'Invalid file name.');
    }
}
