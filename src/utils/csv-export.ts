import path from 'path';
import { createObjectCsvWriter } from 'csv-writer';
import { FileRecord } from '../model/file-record';
import { formatTimestamp } from '../registry/record-serializer';
import { FileUtils } from './file-utils';
import { storageError } from '../errors';

export const CSV_HEADER = [
    { id: 'id', title: 'ID' },
    { id: 'fileName', title: 'File_Name' },
    { id: 'category', title: 'Category' },
    { id: 'storagePath', title: 'Storage_Path' },
    { id: 'createdAt', title: 'Created' },
    { id: 'updatedAt', title: 'Updated' },
    { id: 'contentLength', title: 'Content_Chars' }
];

// A type alias, not an interface: csv-writer expects rows with an index signature
type CsvRow = {
    id: string;
    fileName: string;
    category: string;
    storagePath: string;
    createdAt: string;
    updatedAt: string;
    contentLength: number;
};

function toRow(record: FileRecord): CsvRow {
    return {
        id: record.id,
        fileName: record.fileName,
        category: record.category,
        storagePath: record.storagePath,
        createdAt: formatTimestamp(record.createdAt),
        updatedAt: formatTimestamp(record.updatedAt),
        contentLength: record.content.length
    };
}

/**
 * Write a listing of the given records (metadata only, no content) to a
 * CSV file, replacing any existing file at that path.
 */
export async function exportRecordsToCsv(csvPath: string, records: FileRecord[]): Promise<number> {
    await FileUtils.ensureDirectoryExists(path.dirname(csvPath));

    const csvWriter = createObjectCsvWriter({
        path: csvPath,
        header: CSV_HEADER
    });

    try {
        await csvWriter.writeRecords(records.map(toRow));
    } catch (error) {
        throw storageError(`Failed to write CSV export: ${csvPath}`, error);
    }
    return records.length;
}
