import { validationError } from '../errors';
import { REGISTRY_UNSAFE_CHARS } from '../utils/constants';

export function isRegistrySafe(value: string | null | undefined): boolean {
    if (value === null || value === undefined) {
        return true;
    }
    return !Array.from(value).some(char => REGISTRY_UNSAFE_CHARS.includes(char));
}

/**
 * Category and storage path are stored unescaped, so a `|` or line break
 * in either would make the registry file unreadable.
 *
 * @throws FileKeeperError of kind 'validation'
 */
export function assertRegistrySafe(label: string, value: string | null | undefined): void {
    if (!isRegistrySafe(value)) {
        throw validationError(`${label} cannot contain '|' or line breaks.`);
    }
}
