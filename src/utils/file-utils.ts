import fs from 'fs/promises';
import path from 'path';
import { duplicateError, storageError } from '../errors';

/**
 * True for an ENOENT failure from fs. Checks the shape rather than
 * `instanceof Error`: fs errors can come from another realm (Jest runs
 * tests in a separate context).
 */
export function isMissingFileError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Thin wrappers over fs/promises used to keep file content on disk in step
 * with the registry. Every failure surfaces as a storage error carrying the
 * path and the original cause.
 */
export class FileUtils {
    static async ensureDirectoryExists(dirPath: string): Promise<void> {
        try {
            await fs.mkdir(dirPath, { recursive: true });
        } catch (error) {
            throw storageError(`Cannot create directory: ${dirPath}`, error);
        }
    }

    static async exists(filePath: string): Promise<boolean> {
        try {
            await fs.access(filePath);
            return true;
        } catch {
            return false;
        }
    }

    static async writeFile(filePath: string, content: string): Promise<void> {
        try {
            await fs.writeFile(filePath, content, 'utf-8');
        } catch (error) {
            throw storageError(`Failed to write file: ${filePath}`, error);
        }
    }

    /**
     * Read the whole file with CRLF and lone CR line endings turned into LF.
     */
    static async readFile(filePath: string): Promise<string> {
        let raw: string;
        try {
            raw = await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            if (isMissingFileError(error)) {
                throw storageError(`File does not exist on disk: ${filePath}`, error);
            }
            throw storageError(`Failed to read file: ${filePath}`, error);
        }
        return raw.replace(/\r\n?/g, '\n');
    }

    /**
     * Rename or move a path. Refuses to replace an existing destination.
     */
    static async move(fromPath: string, toPath: string): Promise<void> {
        if (await this.exists(toPath)) {
            throw duplicateError(`Destination already exists: ${toPath}`);
        }
        try {
            await fs.rename(fromPath, toPath);
        } catch (error) {
            throw storageError(`Failed to move ${fromPath} to ${toPath}`, error);
        }
    }

    static async deleteFile(filePath: string): Promise<void> {
        try {
            await fs.unlink(filePath);
        } catch (error) {
            throw storageError(`Failed to delete file from disk: ${filePath}`, error);
        }
    }

    static async appendToLog(logPath: string, entry: object): Promise<void> {
        await this.ensureDirectoryExists(path.dirname(logPath));
        const logLine = `${JSON.stringify(entry)}\n`;
        try {
            await fs.appendFile(logPath, logLine, 'utf-8');
        } catch (error) {
            throw storageError(`Failed to append to log: ${logPath}`, error);
        }
    }
}
