import path from 'path';
import { FileRecord, RecordDependencies } from '../model/file-record';
import { FileRegistry } from '../registry/file-registry';
import { FileUtils } from '../utils/file-utils';
import { exportRecordsToCsv } from '../utils/csv-export';
import { ActivityLogger, silentLogger } from '../utils/activity-log';
import { assertValidFileName } from '../validation/file-name-validator';
import { assertRegistrySafe } from '../validation/registry-field-validator';
import {
    FileKeeperError,
    OperationResult,
    fail,
    isFileKeeperError,
    notFoundError,
    ok,
    storageError,
    duplicateError,
    validationError
} from '../errors';

export interface CreateFileRequest {
    fileName: string;
    content?: string | null;
    storagePath: string;
    category?: string | null;
}

export interface FileServiceOptions extends RecordDependencies {
    logger?: ActivityLogger;
}

/**
 * Command layer: validates input, changes the file on disk, then records
 * the change in the registry.
 *
 * Every operation resolves to an OperationResult instead of throwing. When
 * the disk change succeeded but the registry rewrite did not, the error is
 * a storage error with applied === 'partial' and the caller may retry via
 * retryPersist().
 */
export class FileService {
    private readonly logger: ActivityLogger;

    constructor(
        private readonly registry: FileRegistry,
        private readonly options: FileServiceOptions = {}
    ) {
        this.logger = options.logger ?? silentLogger;
    }

    // ============== CREATE ==============

    createFile(request: CreateFileRequest): Promise<OperationResult<FileRecord>> {
        return this.run(async () => {
            assertValidFileName(request.fileName);
            const storagePath = this.requirePath(request.storagePath);
            assertRegistrySafe('Category', request.category);
            const content = request.content ?? '';

            await FileUtils.ensureDirectoryExists(storagePath);

            const target = path.join(storagePath, request.fileName);
            if (await FileUtils.exists(target)) {
                throw duplicateError(`A file named '${request.fileName}' already exists at: ${storagePath}`);
            }

            await FileUtils.writeFile(target, content);

            const record = FileRecord.create({
                fileName: request.fileName,
                content,
                storagePath,
                category: request.category
            }, this.options);

            await this.persistAfterDiskChange(
                () => this.registry.save(record),
                'File written to disk but registry update failed.'
            );
            await this.logger.record('service', 'create', record.toJSON());
            return record;
        });
    }

    // ============== READ ==============

    /**
     * Look a record up by exact id, then by id prefix, then by exact
     * (case-insensitive) file name.
     */
    resolve(query: string): OperationResult<FileRecord> {
        try {
            return ok(this.resolveOrThrow(query));
        } catch (error) {
            return fail(this.toFileKeeperError(error));
        }
    }

    readAll(): FileRecord[] {
        return this.registry.findAll();
    }

    readByCategory(category: string): FileRecord[] {
        return this.registry.findByCategory(category.trim());
    }

    categories(): string[] {
        return this.registry.categories();
    }

    count(): number {
        return this.registry.count();
    }

    /**
     * Live content from disk, ignoring whatever the registry holds.
     */
    readContentFromDisk(record: FileRecord): Promise<OperationResult<string>> {
        return this.run(async () => {
            if (!(await FileUtils.exists(record.filePath))) {
                throw storageError(`File does not exist on disk: ${record.filePath}`);
            }
            return FileUtils.readFile(record.filePath);
        });
    }

    /**
     * Pull live content into the in-memory record. Not persisted until the
     * next registry rewrite.
     */
    refreshContent(query: string): Promise<OperationResult<FileRecord>> {
        return this.run(async () => {
            const record = this.resolveOrThrow(query);
            const live = await this.readContentFromDisk(record);
            if (!live.success) {
                throw live.error;
            }
            record.setContent(live.value);
            return record;
        });
    }

    // ============== UPDATE ==============

    updateContent(query: string, newContent: string | null | undefined): Promise<OperationResult<FileRecord>> {
        return this.run(async () => {
            const record = this.resolveOrThrow(query);
            const content = newContent ?? '';

            await FileUtils.writeFile(record.filePath, content);

            record.setContent(content);
            await this.persistAfterDiskChange(
                () => this.registry.update(record),
                'File updated on disk but registry update failed.'
            );
            await this.logger.record('service', 'update_content', record.toJSON());
            return record;
        });
    }

    renameFile(query: string, newFileName: string): Promise<OperationResult<FileRecord>> {
        return this.run(async () => {
            assertValidFileName(newFileName);
            const record = this.resolveOrThrow(query);
            const previousName = record.fileName;
            const target = path.join(record.storagePath, newFileName);

            if (await FileUtils.exists(target)) {
                throw duplicateError(`A file named '${newFileName}' already exists at: ${record.storagePath}`);
            }
            await FileUtils.move(record.filePath, target);

            record.setFileName(newFileName);
            await this.persistAfterDiskChange(
                () => this.registry.update(record),
                'File renamed on disk but registry update failed.'
            );
            await this.logger.record('service', 'rename', { ...record.toJSON(), previousName });
            return record;
        });
    }

    moveFile(query: string, newStoragePath: string): Promise<OperationResult<FileRecord>> {
        return this.run(async () => {
            const record = this.resolveOrThrow(query);
            const storagePath = this.requirePath(newStoragePath);
            const previousPath = record.storagePath;

            await FileUtils.ensureDirectoryExists(storagePath);

            const target = path.join(storagePath, record.fileName);
            if (await FileUtils.exists(target)) {
                throw duplicateError(`A file named '${record.fileName}' already exists at: ${storagePath}`);
            }
            await FileUtils.move(record.filePath, target);

            record.setStoragePath(storagePath);
            await this.persistAfterDiskChange(
                () => this.registry.update(record),
                'File moved on disk but registry update failed.'
            );
            await this.logger.record('service', 'move', { ...record.toJSON(), previousPath });
            return record;
        });
    }

    /**
     * Category is registry-only metadata; nothing on disk changes.
     */
    updateCategory(query: string, category: string | null | undefined): Promise<OperationResult<FileRecord>> {
        return this.run(async () => {
            assertRegistrySafe('Category', category);
            const record = this.resolveOrThrow(query);
            record.setCategory(category);
            try {
                await this.registry.update(record);
            } catch (error) {
                throw storageError('Registry update failed.', error);
            }
            await this.logger.record('service', 'update_category', record.toJSON());
            return record;
        });
    }

    // ============== DELETE ==============

    deleteFile(query: string): Promise<OperationResult<FileRecord>> {
        return this.run(async () => {
            const record = this.resolveOrThrow(query);
            const onDisk = await FileUtils.exists(record.filePath);

            if (onDisk) {
                await FileUtils.deleteFile(record.filePath);
                await this.persistAfterDiskChange(
                    () => this.registry.delete(record.id),
                    'File deleted from disk but registry update failed.'
                );
            } else {
                try {
                    await this.registry.delete(record.id);
                } catch (error) {
                    throw storageError('Registry update failed.', error);
                }
            }
            await this.logger.record('service', 'delete', { ...record.toJSON(), fileWasOnDisk: onDisk });
            return record;
        });
    }

    // ============== MAINTENANCE ==============

    /**
     * Rewrite the registry file from memory after a partially applied
     * operation.
     */
    retryPersist(): Promise<OperationResult<number>> {
        return this.run(async () => {
            await this.registry.persist();
            await this.logger.record('service', 'retry_persist', { records: this.registry.count() });
            return this.registry.count();
        });
    }

    exportCsv(csvPath: string): Promise<OperationResult<number>> {
        return this.run(async () => {
            const target = csvPath.trim();
            if (target === '') {
                throw validationError('CSV file path cannot be empty.');
            }
            const written = await exportRecordsToCsv(target, this.registry.findAll());
            await this.logger.record('service', 'export_csv', { path: target, records: written });
            return written;
        });
    }

    // ============== PRIVATE HELPERS ==============

    private resolveOrThrow(query: string): FileRecord {
        const wanted = query.trim();
        if (wanted === '') {
            throw validationError('Enter a file ID or file name.');
        }

        const record = this.registry.findById(wanted)
            ?? this.registry.findByIdPrefix(wanted)
            ?? this.registry.findByFileName(wanted);

        if (!record) {
            throw notFoundError(`No file found with ID or name: ${wanted}`);
        }
        return record;
    }

    private requirePath(value: string): string {
        const trimmed = value.trim();
        if (trimmed === '') {
            throw validationError('Storage path cannot be empty.');
        }
        assertRegistrySafe('Storage path', trimmed);
        return trimmed;
    }

    private async persistAfterDiskChange(write: () => Promise<unknown>, message: string): Promise<void> {
        try {
            await write();
        } catch (error) {
            throw storageError(message, error, 'partial');
        }
    }

    private async run<T>(operation: () => Promise<T>): Promise<OperationResult<T>> {
        try {
            return ok(await operation());
        } catch (error) {
            return fail(this.toFileKeeperError(error));
        }
    }

    private toFileKeeperError(error: unknown): FileKeeperError {
        if (isFileKeeperError(error)) {
            return error;
        }
        return storageError('Unexpected failure.', error);
    }
}
