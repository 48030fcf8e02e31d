import { Incident } from './types';

/**
 * Append-only destination for per-URL incidents
 */
export interface IErrorSink {
  report(incident: Incident): void;
  close(): void;
}
