export const DEFAULT_CATEGORY = 'General';
export const FIELD_DELIMITER = '|';
export const SHORT_ID_LENGTH = 8;

export const REGISTRY_FILE_NAME = 'filekeeper_registry.dat';
export const REGISTRY_TEMP_FILE_NAME = 'filekeeper_registry.tmp';
export const ACTIVITY_LOG_FILE_NAME = 'activity.log';

// Terminates multi-line content entry in the menu
export const END_OF_INPUT_MARKER = 'END';

export const ILLEGAL_FILE_NAME_CHARS = ['<', '>', ':', '"', '/', '\\', '|', '?', '*'];

// Written verbatim into the registry line, so they must never appear in
// category or storage path values
export const REGISTRY_UNSAFE_CHARS = ['|', '\n', '\r'];
