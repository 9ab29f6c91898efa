import path from 'path';
import { randomUUID } from 'crypto';
import { DEFAULT_CATEGORY, SHORT_ID_LENGTH } from '../utils/constants';

/**
 * Supplies "now" for timestamp assignment. Swapped out in tests to get
 * deterministic createdAt/updatedAt values.
 */
export interface Clock {
    now(): Date;
}

export type IdGenerator = () => string;

export const systemClock: Clock = {
    now: () => new Date()
};

export const uuidGenerator: IdGenerator = () => randomUUID();

export interface RecordDependencies {
    clock?: Clock;
    generateId?: IdGenerator;
}

export interface NewFileRecordInput {
    fileName: string;
    content?: string | null;
    storagePath: string;
    category?: string | null;
}

export interface FileRecordProps {
    id: string;
    fileName: string;
    content?: string | null;
    storagePath: string;
    category?: string | null;
    createdAt: Date;
    updatedAt: Date;
}

export interface FileRecordSnapshot {
    id: string;
    shortId: string;
    fileName: string;
    storagePath: string;
    category: string;
    createdAt: string;
    updatedAt: string;
    contentLength: number;
}

export function normalizeCategory(category: string | null | undefined): string {
    const trimmed = (category ?? '').trim();
    return trimmed === '' ? DEFAULT_CATEGORY : trimmed;
}

/**
 * Metadata for one tracked text file.
 *
 * The id and createdAt are fixed at construction. Every setter refreshes
 * updatedAt, which is never allowed to fall behind createdAt.
 */
export class FileRecord {
    readonly id: string;
    private readonly _createdAt: Date;
    private _fileName: string;
    private _content: string;
    private _storagePath: string;
    private _category: string;
    private _updatedAt: Date;
    private readonly clock: Clock;

    constructor(props: FileRecordProps, clock: Clock = systemClock) {
        this.id = props.id;
        this._fileName = props.fileName;
        this._content = props.content ?? '';
        this._storagePath = props.storagePath;
        this._category = normalizeCategory(props.category);
        this._createdAt = new Date(props.createdAt.getTime());
        this._updatedAt = this.clampToCreation(props.updatedAt);
        this.clock = clock;
    }

    /**
     * Build a brand-new record: fresh id, both timestamps set to the same "now".
     */
    static create(input: NewFileRecordInput, deps: RecordDependencies = {}): FileRecord {
        const clock = deps.clock ?? systemClock;
        const generateId = deps.generateId ?? uuidGenerator;
        const now = clock.now();

        return new FileRecord({
            id: generateId(),
            fileName: input.fileName,
            content: input.content,
            storagePath: input.storagePath,
            category: input.category,
            createdAt: now,
            updatedAt: now
        }, clock);
    }

    get fileName(): string {
        return this._fileName;
    }

    get content(): string {
        return this._content;
    }

    get storagePath(): string {
        return this._storagePath;
    }

    get category(): string {
        return this._category;
    }

    // Copies: the stored dates never leave the record
    get createdAt(): Date {
        return new Date(this._createdAt.getTime());
    }

    get updatedAt(): Date {
        return new Date(this._updatedAt.getTime());
    }

    get shortId(): string {
        return this.id.substring(0, SHORT_ID_LENGTH);
    }

    get filePath(): string {
        return path.join(this._storagePath, this._fileName);
    }

    setFileName(fileName: string, at?: Date): this {
        this._fileName = fileName;
        return this.touch(at);
    }

    setContent(content: string | null | undefined, at?: Date): this {
        this._content = content ?? '';
        return this.touch(at);
    }

    setStoragePath(storagePath: string, at?: Date): this {
        this._storagePath = storagePath;
        return this.touch(at);
    }

    setCategory(category: string | null | undefined, at?: Date): this {
        this._category = normalizeCategory(category);
        return this.touch(at);
    }

    toJSON(): FileRecordSnapshot {
        return {
            id: this.id,
            shortId: this.shortId,
            fileName: this._fileName,
            storagePath: this._storagePath,
            category: this._category,
            createdAt: this._createdAt.toISOString(),
            updatedAt: this._updatedAt.toISOString(),
            contentLength: this._content.length
        };
    }

    private touch(at?: Date): this {
        this._updatedAt = this.clampToCreation(at ?? this.clock.now());
        return this;
    }

    private clampToCreation(date: Date): Date {
        return date.getTime() < this._createdAt.getTime()
            ? new Date(this._createdAt.getTime())
            : new Date(date.getTime());
    }
}
