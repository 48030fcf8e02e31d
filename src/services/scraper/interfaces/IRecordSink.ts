import { StaffRecord } from './types';

/**
 * Append-only destination for extracted records
 */
export interface IRecordSink {
  write(record: StaffRecord): void;
  close(): void;
}
