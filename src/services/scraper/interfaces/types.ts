/**
 * Common types and enums for the scraper service
 */

/**
 * One extracted staff member. Every field is a string; optional fields are
 * empty rather than absent so that every output row has the same width.
 */
export interface StaffRecord {
  name: string;
  email: string;
  title: string;
  phone: string;
  department: string;
  sourceUrl: string;
}

/**
 * Why a page could not be retrieved
 */
export enum FetchFailureReason {
  REQUEST_FAILED = 'RequestFailed',
  RENDERER_UNAVAILABLE = 'RendererUnavailable',
  RENDERER_FAILED = 'RendererFailed'
}

/**
 * Result of fetching a single URL
 */
export type FetchOutcome =
  | { ok: true; html: string; via: 'http' | 'renderer' }
  | { ok: false; reason: FetchFailureReason; message: string };

/**
 * Identifiers for the built-in extraction strategies
 */
export enum StrategyId {
  VENDOR_TABLE = 'vendor-table',
  GENERIC_TABLE = 'generic-table',
  DEFINITION_LIST = 'definition-list'
}

/**
 * A problem worth recording in the error log for one URL
 */
export type Incident =
  | { kind: 'renderer-failed'; url: string; reason: string }
  | { kind: 'unreachable'; url: string }
  | { kind: 'parse-failed'; url: string; reason: string }
  | { kind: 'no-data'; url: string; strategies: string[] }
  | { kind: 'unexpected'; url: string; reason: string };

/**
 * Options for the plain HTTP fetcher
 */
export interface HttpFetchOptions {
  userAgent: string;
  timeoutMs: number;
}

/**
 * Options for the browser render session
 */
export interface RenderOptions {
  userAgent: string;
  executablePath?: string;
  navigationTimeoutMs: number;
  waitTimeoutMs: number;
  settleDelayMs: number;
}

/**
 * Totals reported at the end of a batch
 */
export interface BatchSummary {
  totalUrls: number;
  totalRecords: number;
  failedOrEmpty: number;
}
