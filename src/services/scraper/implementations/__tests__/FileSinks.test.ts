import fs from 'fs';
import os from 'os';
import path from 'path';
import { CsvRecordSink } from '../CsvRecordSink';
import { TextErrorSink } from '../TextErrorSink';
import { OutputSinkError } from '../../../../utils/errors';

describe('file sinks', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'staff-sinks-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('CsvRecordSink', () => {
    it('should write the header and one row per record', () => {
      const file = path.join(dir, 'staff.csv');
      const sink = CsvRecordSink.open(file);

      sink.write({
        name: 'Jane Doe',
        email: 'jdoe@example.edu',
        title: 'Assistant Coach, Offense',
        phone: '555-123-4567',
        department: 'Football',
        sourceUrl: 'https://athletics.example.edu/staff',
      });
      sink.write({
        name: 'Sam Lee',
        email: '',
        title: '',
        phone: '',
        department: '',
        sourceUrl: 'https://athletics.example.edu/staff',
      });
      sink.close();

      expect(fs.readFileSync(file, 'utf8')).toBe(
        'Name,Email,Position/Title,Phone,Sport/Department,Source URL\n' +
        'Jane Doe,jdoe@example.edu,"Assistant Coach, Offense",555-123-4567,Football,https://athletics.example.edu/staff\n' +
        'Sam Lee,,,,,https://athletics.example.edu/staff\n'
      );
    });

    it('should write rows before the sink is closed', () => {
      const file = path.join(dir, 'staff.csv');
      const sink = CsvRecordSink.open(file);

      sink.write({ name: 'A', email: '', title: '', phone: '', department: '', sourceUrl: 'u' });

      expect(fs.readFileSync(file, 'utf8')).toContain('A,,,,,u\n');
      sink.close();
    });

    it('should throw OutputSinkError when the file cannot be created', () => {
      expect(() => CsvRecordSink.open(path.join(dir, 'missing', 'staff.csv'))).toThrow(OutputSinkError);
    });

    it('should tolerate closing twice', () => {
      const sink = CsvRecordSink.open(path.join(dir, 'staff.csv'));

      sink.close();
      expect(() => sink.close()).not.toThrow();
    });
  });

  describe('TextErrorSink', () => {
    it('should append one block per incident', () => {
      const file = path.join(dir, 'errors.txt');
      const sink = TextErrorSink.open(file);

      sink.report({ kind: 'unreachable', url: 'https://a.example.edu' });
      sink.report({ kind: 'unexpected', url: 'https://b.example.edu', reason: 'boom' });
      sink.close();

      expect(fs.readFileSync(file, 'utf8')).toBe(
        'ERROR: Could not fetch URL (HTTP request failed, no browser renderer): https://a.example.edu\n' +
        '-------\n' +
        'FATAL ERROR: Unexpected issue processing URL: https://b.example.edu\n' +
        '       Reason: boom\n' +
        '-------\n'
      );
    });

    it('should throw OutputSinkError when the file cannot be created', () => {
      expect(() => TextErrorSink.open(path.join(dir, 'missing', 'errors.txt'))).toThrow(OutputSinkError);
    });
  });
});
