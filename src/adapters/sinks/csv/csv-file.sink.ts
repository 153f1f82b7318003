import * as fs from 'fs';
import * as path from 'path';
import { once } from 'events';
import { finished } from 'stream/promises';
import { format } from 'fast-csv';
import {
  ExportSink,
  ExportSinkError,
  SinkHandle,
} from '../../../core/interfaces';

/**
 * Export directory used when none is configured
 */
export const DEFAULT_EXPORT_DIRECTORY = path.resolve(process.cwd(), 'storage');

export interface CsvFileSinkOptions {
  directory?: string;
}

export interface CsvSinkHandle extends SinkHandle {
  readonly path: string;
  readonly file: fs.WriteStream;
  readonly csv: ReturnType<typeof format>;
}

/**
 * File system export sink - one CSV file per destination name
 */
export class CsvFileSink implements ExportSink<CsvSinkHandle> {
  readonly directory: string;

  constructor(options: CsvFileSinkOptions = {}) {
    this.directory = options.directory ?? DEFAULT_EXPORT_DIRECTORY;
  }

  async prepare(): Promise<void> {
    try {
      await fs.promises.mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new ExportSinkError(
        `Cannot create export directory ${this.directory}`,
        this.directory,
        error instanceof Error ? error : undefined,
      );
    }
  }

  async open(name: string): Promise<CsvSinkHandle> {
    const filePath = path.join(this.directory, name);
    const file = fs.createWriteStream(filePath, { flags: 'w' });

    try {
      await once(file, 'open');
    } catch (error) {
      throw new ExportSinkError(
        `Cannot open export file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        filePath,
        error instanceof Error ? error : undefined,
      );
    }

    const csv = format({ includeEndRowDelimiter: true });
    csv.pipe(file);

    return { name, path: filePath, file, csv };
  }

  async writeRow(handle: CsvSinkHandle, fields: string[]): Promise<void> {
    handle.csv.write(fields);
  }

  /**
   * Flush the formatter and wait until the file is fully written
   */
  async close(handle: CsvSinkHandle): Promise<void> {
    handle.csv.end();
    await finished(handle.file);
  }
}
