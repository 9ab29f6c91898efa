import { EventEmitter } from 'events';
import fs from 'fs/promises';
import path from 'path';
import { Clock, FileRecord, systemClock } from '../model/file-record';
import { corruptionError, isFileKeeperError, storageError } from '../errors';
import { REGISTRY_FILE_NAME, REGISTRY_TEMP_FILE_NAME } from '../utils/constants';
import { isMissingFileError } from '../utils/file-utils';
import { decodeRecord, encodeRecord } from './record-serializer';

/**
 * FileRegistry: durable store of FileRecords
 *
 * PURPOSE:
 * Sole owner of the canonical record collection. Records live in an
 * insertion-ordered Map keyed by id and are mirrored to one flat file
 * (filekeeper_registry.dat) inside the registry directory.
 *
 * PERSISTENCE:
 * Every mutation rewrites the whole file:
 *   1. encode every record, in insertion order, one line each
 *   2. write the lines to filekeeper_registry.tmp in the same directory
 *   3. sync and close the temp file
 *   4. delete the old registry file if present
 *   5. rename the temp file over the registry file
 * A failure before step 5 leaves the previous file readable.
 *
 * The map is updated before the rewrite, so a failed rewrite leaves memory
 * ahead of disk. Callers may retry with persist().
 *
 * CONCURRENCY:
 * Mutations run one at a time through an internal queue, so a
 * read-modify-rewrite sequence is never interleaved with another one.
 * No file locks are taken; one process owns the directory.
 *
 * EVENTS:
 * Emits 'log' with { event, ...details, timestamp } for load, save,
 * delete, persist and persist_failed.
 */

export interface RegistryLogDetails {
    event: 'load' | 'save' | 'delete' | 'persist' | 'persist_failed';
    [detail: string]: unknown;
}

export interface RegistryLogEvent extends RegistryLogDetails {
    timestamp: number;
}

/**
 * Filesystem calls the registry relies on. The default goes straight to
 * fs/promises; tests substitute failing steps.
 */
export interface RegistryStorage {
    readText(filePath: string): Promise<string | null>;
    writeDurably(filePath: string, data: string): Promise<void>;
    remove(filePath: string): Promise<void>;
    rename(fromPath: string, toPath: string): Promise<void>;
}

export class NodeRegistryStorage implements RegistryStorage {
    async readText(filePath: string): Promise<string | null> {
        try {
            return await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            if (isMissingFileError(error)) {
                return null;
            }
            throw error;
        }
    }

    async writeDurably(filePath: string, data: string): Promise<void> {
        const handle = await fs.open(filePath, 'w');
        try {
            await handle.writeFile(data, 'utf-8');
            await handle.sync();
        } finally {
            await handle.close();
        }
    }

    async remove(filePath: string): Promise<void> {
        await fs.rm(filePath, { force: true });
    }

    async rename(fromPath: string, toPath: string): Promise<void> {
        await fs.rename(fromPath, toPath);
    }
}

export interface RegistryOptions {
    clock?: Clock;
    storage?: RegistryStorage;
}

function byCreatedAtDescending(a: FileRecord, b: FileRecord): number {
    return b.createdAt.getTime() - a.createdAt.getTime();
}

export class FileRegistry extends EventEmitter {
    private readonly store: Map<string, FileRecord> = new Map();
    private readonly storage: RegistryStorage;
    private readonly clock: Clock;
    private queue: Promise<void> = Promise.resolve();

    readonly registryFilePath: string;
    private readonly tempFilePath: string;

    private constructor(readonly directory: string, options: RegistryOptions) {
        super();
        this.storage = options.storage ?? new NodeRegistryStorage();
        this.clock = options.clock ?? systemClock;
        this.registryFilePath = path.join(directory, REGISTRY_FILE_NAME);
        this.tempFilePath = path.join(directory, REGISTRY_TEMP_FILE_NAME);
    }

    /**
     * Create the directory if needed and load whatever the registry file
     * holds. A missing file is an empty registry (first run).
     *
     * @throws FileKeeperError 'storage' if the directory cannot be created or
     *         the file cannot be read, 'corruption' if a line does not parse
     */
    static async open(directory: string, options: RegistryOptions = {}): Promise<FileRegistry> {
        try {
            await fs.mkdir(directory, { recursive: true });
        } catch (error) {
            throw storageError(`Cannot create registry directory: ${directory}`, error);
        }

        const registry = new FileRegistry(directory, options);
        await registry.load();
        return registry;
    }

    /**
     * Insert or replace by id, then rewrite the registry file.
     */
    save(record: FileRecord): Promise<void> {
        return this.enqueue(async () => {
            const replaced = this.store.has(record.id);
            this.store.set(record.id, record);
            await this.writeToDisk();
            this.emitLog({ event: 'save', id: record.id, fileName: record.fileName, replaced });
        });
    }

    /**
     * Alias of save() for records already in the registry.
     */
    update(record: FileRecord): Promise<void> {
        return this.save(record);
    }

    /**
     * @returns false when no record had this id (nothing is rewritten then)
     */
    delete(id: string): Promise<boolean> {
        return this.enqueue(async () => {
            if (!this.store.delete(id)) {
                return false;
            }
            await this.writeToDisk();
            this.emitLog({ event: 'delete', id });
            return true;
        });
    }

    /**
     * Rewrite the registry file from the current map. Used to retry after a
     * failed save/update/delete.
     */
    persist(): Promise<void> {
        return this.enqueue(() => this.writeToDisk());
    }

    findById(id: string): FileRecord | undefined {
        return this.store.get(id);
    }

    /**
     * First record, newest first, whose id starts with the prefix.
     */
    findByIdPrefix(prefix: string): FileRecord | undefined {
        if (prefix === '') {
            return undefined;
        }
        return this.findAll().find(record => record.id.startsWith(prefix));
    }

    findByFileName(fileName: string): FileRecord | undefined {
        const wanted = fileName.toLowerCase();
        for (const record of this.store.values()) {
            if (record.fileName.toLowerCase() === wanted) {
                return record;
            }
        }
        return undefined;
    }

    findAll(): FileRecord[] {
        return Array.from(this.store.values()).sort(byCreatedAtDescending);
    }

    findByCategory(category: string): FileRecord[] {
        const wanted = category.toLowerCase();
        return Array.from(this.store.values())
            .filter(record => record.category.toLowerCase() === wanted)
            .sort(byCreatedAtDescending);
    }

    /**
     * Distinct categories in use, alphabetically.
     */
    categories(): string[] {
        const unique = new Set<string>();
        for (const record of this.store.values()) {
            unique.add(record.category);
        }
        return Array.from(unique).sort((a, b) => a.localeCompare(b));
    }

    count(): number {
        return this.store.size;
    }

    // ============== PRIVATE HELPERS ==============

    private enqueue<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(task);
        // A failed rewrite must not wedge the queue for later calls
        this.queue = run.then(() => undefined, () => undefined);
        return run;
    }

    private async load(): Promise<void> {
        let text: string | null;
        try {
            text = await this.storage.readText(this.registryFilePath);
        } catch (error) {
            throw storageError(`Failed to read registry file: ${this.registryFilePath}`, error);
        }

        if (text === null) {
            this.emitLog({ event: 'load', records: 0, fileFound: false });
            return;
        }

        const lines = text.split('\n');
        lines.forEach((rawLine, index) => {
            const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
            if (line.trim() === '') {
                return;
            }
            try {
                const record = decodeRecord(line, this.clock);
                this.store.set(record.id, record);
            } catch (error) {
                const reason = isFileKeeperError(error) ? error.message : String(error);
                throw corruptionError(`Registry file ${this.registryFilePath}, line ${index + 1}: ${reason}`, error);
            }
        });

        this.emitLog({ event: 'load', records: this.store.size, fileFound: true });
    }

    private async writeToDisk(): Promise<void> {
        const data = Array.from(this.store.values())
            .map(record => `${encodeRecord(record)}\n`)
            .join('');

        let step = 'write temporary registry file';
        try {
            await this.storage.writeDurably(this.tempFilePath, data);
            step = 'remove previous registry file';
            await this.storage.remove(this.registryFilePath);
            step = 'rename temporary registry file';
            await this.storage.rename(this.tempFilePath, this.registryFilePath);
        } catch (error) {
            this.emitLog({ event: 'persist_failed', step, records: this.store.size });
            throw storageError(`Registry rewrite failed (${step}): ${this.registryFilePath}`, error);
        }

        this.emitLog({ event: 'persist', records: this.store.size });
    }

    private emitLog(details: RegistryLogDetails): void {
        const entry: RegistryLogEvent = { ...details, timestamp: Date.now() };
        this.emit('log', entry);
    }
}
