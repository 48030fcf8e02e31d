import fs from 'fs';
import { stringify } from 'csv-stringify/sync';
import { IRecordSink } from '../interfaces/IRecordSink';
import { StaffRecord } from '../interfaces/types';
import { OutputSinkError } from '../../../utils/errors';

export const CSV_HEADER = ['Name', 'Email', 'Position/Title', 'Phone', 'Sport/Department', 'Source URL'];

/**
 * Writes records to a CSV file as they arrive. The file is truncated and the
 * header written when the sink is opened.
 */
export class CsvRecordSink implements IRecordSink {
  private fd: number | null;

  private constructor(private readonly path: string, fd: number) {
    this.fd = fd;
  }

  /**
   * @throws OutputSinkError when the file cannot be created or written
   */
  static open(path: string): CsvRecordSink {
    let fd: number;
    try {
      fd = fs.openSync(path, 'w');
    } catch (error) {
      throw new OutputSinkError(path, error);
    }

    const sink = new CsvRecordSink(path, fd);
    sink.append([CSV_HEADER]);
    return sink;
  }

  write(record: StaffRecord): void {
    this.append([[
      record.name,
      record.email,
      record.title,
      record.phone,
      record.department,
      record.sourceUrl,
    ]]);
  }

  close(): void {
    if (this.fd === null) {
      return;
    }
    fs.closeSync(this.fd);
    this.fd = null;
  }

  private append(rows: string[][]): void {
    if (this.fd === null) {
      throw new OutputSinkError(this.path, new Error('sink is closed'));
    }
    try {
      fs.writeSync(this.fd, stringify(rows));
    } catch (error) {
      throw new OutputSinkError(this.path, error);
    }
  }
}
