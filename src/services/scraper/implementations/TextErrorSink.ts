import fs from 'fs';
import { IErrorSink } from '../interfaces/IErrorSink';
import { Incident } from '../interfaces/types';
import { OutputSinkError } from '../../../utils/errors';
import { formatIncident } from './incident-format';

/**
 * Plain-text error log, one block per incident.
 */
export class TextErrorSink implements IErrorSink {
  private fd: number | null;

  private constructor(private readonly path: string, fd: number) {
    this.fd = fd;
  }

  /**
   * @throws OutputSinkError when the file cannot be created
   */
  static open(path: string): TextErrorSink {
    try {
      return new TextErrorSink(path, fs.openSync(path, 'w'));
    } catch (error) {
      throw new OutputSinkError(path, error);
    }
  }

  report(incident: Incident): void {
    if (this.fd === null) {
      throw new OutputSinkError(this.path, new Error('sink is closed'));
    }
    try {
      fs.writeSync(this.fd, formatIncident(incident));
    } catch (error) {
      throw new OutputSinkError(this.path, error);
    }
  }

  close(): void {
    if (this.fd === null) {
      return;
    }
    fs.closeSync(this.fd);
    this.fd = null;
  }
}
