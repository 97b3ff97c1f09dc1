import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { stringify } from 'csv-stringify/sync';
import { logger } from '../../../shared/logger';
import { WriteError } from '../core/errors';
import { RECORD_FIELDS, type VideoMetadataRecord } from '../core/types';
import type { RecordWriter } from './RecordWriter';

export function toCsvRow(record: VideoMetadataRecord): string[] {
  return RECORD_FIELDS.map((field) => String(record[field]));
}

export function formatCsvLine(values: string[]): string {
  return stringify([values]);
}

/**
 * Appends one CSV line per record. The first write replaces any file at
 * `filePath` with a header line.
 */
export class CsvRecordWriter implements RecordWriter {
  private created = false;
  private closed = false;
  private count = 0;

  constructor(private readonly filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  get written(): number {
    return this.count;
  }

  async write(record: VideoMetadataRecord): Promise<void> {
    if (this.closed) {
      throw new WriteError(this.filePath, {
        cause: new Error('writer is closed'),
      });
    }

    try {
      if (!this.created) {
        await mkdir(path.dirname(this.filePath), { recursive: true });
        await writeFile(this.filePath, formatCsvLine([...RECORD_FIELDS]));
        this.created = true;
        logger.debug(`Created output sink ${this.filePath}`);
      }
      await appendFile(this.filePath, formatCsvLine(toCsvRow(record)));
    } catch (error) {
      throw new WriteError(this.filePath, { cause: error });
    }

    this.count++;
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }
}
