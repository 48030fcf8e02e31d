import { IRecordSink } from '../../interfaces/IRecordSink';
import { IErrorSink } from '../../interfaces/IErrorSink';
import { Incident, StaffRecord } from '../../interfaces/types';
import { formatIncident } from '../../implementations/incident-format';

export class InMemoryRecordSink implements IRecordSink {
  readonly records: StaffRecord[] = [];
  closed = false;

  write(record: StaffRecord): void {
    this.records.push(record);
  }

  close(): void {
    this.closed = true;
  }
}

export class InMemoryErrorSink implements IErrorSink {
  readonly incidents: Incident[] = [];
  closed = false;

  report(incident: Incident): void {
    this.incidents.push(incident);
  }

  /** The error log as it would appear on disk */
  text(): string {
    return this.incidents.map(formatIncident).join('');
  }

  close(): void {
    this.closed = true;
  }
}
