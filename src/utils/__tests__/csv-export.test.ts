import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { exportRecordsToCsv } from '../csv-export';
import { FileRecord } from '../../model/file-record';

describe('exportRecordsToCsv()', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'filekeeper-csv-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('should write metadata rows without content', async () => {
    const record = new FileRecord({
      id: 'id-1',
      fileName: 'notes.txt',
      content: 'secret body',
      storagePath: '/data/docs',
      category: 'Work',
      createdAt: new Date(2024, 0, 15, 10, 30, 0),
      updatedAt: new Date(2024, 0, 16, 11, 0, 5)
    });
    const csvPath = path.join(dir, 'nested', 'out.csv');

    expect(await exportRecordsToCsv(csvPath, [record])).toBe(1);

    expect(await fs.readFile(csvPath, 'utf-8')).toBe(
      'ID,File_Name,Category,Storage_Path,Created,Updated,Content_Chars\n' +
      'id-1,notes.txt,Work,/data/docs,2024-01-15T10:30:00,2024-01-16T11:00:05,11\n'
    );
  });

  test('should quote values containing commas', async () => {
    const record = new FileRecord({
      id: 'id-2',
      fileName: 'a,b.txt',
      storagePath: '/tmp',
      createdAt: new Date(2024, 0, 15, 10, 30, 0),
      updatedAt: new Date(2024, 0, 15, 10, 30, 0)
    });
    const csvPath = path.join(dir, 'out.csv');

    await exportRecordsToCsv(csvPath, [record]);

    const lines = (await fs.readFile(csvPath, 'utf-8')).split('\n');
    expect(lines[1]).toBe('id-2,"a,b.txt",General,/tmp,2024-01-15T10:30:00,2024-01-15T10:30:00,0');
  });
});
