import type { CheerioAPI } from 'cheerio';
import { StaffRecord, StrategyId } from './types';

/**
 * A structural recognizer that maps one kind of page markup onto staff records.
 * An empty result means the strategy did not recognize the page.
 */
export interface IExtractionStrategy {
  readonly id: StrategyId;

  /** Human readable name used in logs and the error log */
  readonly name: string;

  extract($: CheerioAPI, sourceUrl: string): StaffRecord[];
}
