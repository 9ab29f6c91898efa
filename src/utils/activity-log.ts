import path from 'path';
import { FileUtils } from './file-utils';
import { describeError } from '../errors';
import { ACTIVITY_LOG_FILE_NAME } from './constants';
import type { FileRegistry, RegistryLogEvent } from '../registry/file-registry';

export interface ActivityLogEntry {
    timestamp: string;
    source: 'registry' | 'service';
    message: string;
    data?: object;
}

export interface ActivityLogger {
    record(source: ActivityLogEntry['source'], message: string, data?: object): Promise<void>;
}

export const silentLogger: ActivityLogger = {
    record: async () => undefined
};

/**
 * JSON-lines diagnostics log. Writes are chained so entries land in the
 * order they were recorded; a failed write is reported on stderr and never
 * fails the operation that produced it.
 */
export class ActivityLog implements ActivityLogger {
    private pending: Promise<void> = Promise.resolve();

    constructor(
        readonly logPath: string,
        private readonly enabled: boolean = true
    ) { }

    static inDirectory(logDirectory: string, enabled: boolean = true): ActivityLog {
        return new ActivityLog(path.join(logDirectory, ACTIVITY_LOG_FILE_NAME), enabled);
    }

    record(source: ActivityLogEntry['source'], message: string, data?: object): Promise<void> {
        if (!this.enabled) {
            return Promise.resolve();
        }

        const entry: ActivityLogEntry = {
            timestamp: new Date().toISOString(),
            source,
            message,
            data
        };

        this.pending = this.pending.then(() => FileUtils.appendToLog(this.logPath, entry)).catch(error => {
            console.error(`⚠️  Activity log write failed: ${describeError(error)}`);
        });
        return this.pending;
    }

    /**
     * Mirror every registry 'log' event into this log.
     */
    attach(registry: FileRegistry): void {
        registry.on('log', (event: RegistryLogEvent) => {
            const { event: name, timestamp, ...details } = event;
            void this.record('registry', name, { ...details, emittedAt: new Date(timestamp).toISOString() });
        });
    }

    /**
     * Resolves once every entry recorded so far has been written.
     */
    flush(): Promise<void> {
        return this.pending;
    }
}
