/**
 * Error model shared by every layer.
 *
 * Failures are classified into a closed set of kinds. Callers switch on
 * `error.kind` instead of checking class hierarchies:
 *
 * - validation: malformed input, detected before any side effect
 * - duplicate:  a create/rename/move would collide with an existing path
 * - not_found:  no record matches an id, id prefix or filename
 * - storage:    filesystem or registry rewrite failure
 * - corruption: the registry file does not parse
 *
 * Storage errors also say whether the operation was partially applied
 * (disk changed, registry not updated) or not applied at all.
 */

export type ErrorKind = 'validation' | 'duplicate' | 'not_found' | 'storage' | 'corruption';

export type AppliedState = 'none' | 'partial';

export class FileKeeperError extends Error {
    constructor(
        public readonly kind: ErrorKind,
        message: string,
        public readonly applied: AppliedState = 'none',
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'FileKeeperError';
    }

    get partiallyApplied(): boolean {
        return this.applied === 'partial';
    }
}

export function validationError(message: string): FileKeeperError {
    return new FileKeeperError('validation', message);
}

export function duplicateError(message: string): FileKeeperError {
    return new FileKeeperError('duplicate', message);
}

export function notFoundError(message: string): FileKeeperError {
    return new FileKeeperError('not_found', message);
}

export function storageError(message: string, cause?: unknown, applied: AppliedState = 'none'): FileKeeperError {
    return new FileKeeperError('storage', message, applied, { cause });
}

export function corruptionError(message: string, cause?: unknown): FileKeeperError {
    return new FileKeeperError('corruption', message, 'none', { cause });
}

export function isFileKeeperError(error: unknown): error is FileKeeperError {
    return error instanceof FileKeeperError;
}

/**
 * Message of any thrown value, with the cause's message appended for
 * wrapped storage and corruption errors.
 */
export function describeError(error: unknown): string {
    const message = messageOf(error);
    if (message === undefined) {
        return String(error);
    }
    const cause = typeof error === 'object' && error !== null && 'cause' in error
        ? messageOf(error.cause)
        : undefined;
    return cause === undefined ? message : `${message} (${cause})`;
}

// Shape check: errors raised by fs may come from another realm
function messageOf(value: unknown): string | undefined {
    if (typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string') {
        return value.message;
    }
    return undefined;
}

export type OperationResult<T> =
    | { success: true; value: T }
    | { success: false; error: FileKeeperError };

export function ok<T>(value: T): OperationResult<T> {
    return { success: true, value };
}

export function fail<T>(error: FileKeeperError): OperationResult<T> {
    return { success: false, error };
}
