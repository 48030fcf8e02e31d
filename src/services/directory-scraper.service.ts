import type { CheerioAPI } from 'cheerio';
import { IPageFetcher } from './scraper/interfaces/IPageFetcher';
import { IExtractionStrategy } from './scraper/interfaces/IExtractionStrategy';
import { IRecordSink } from './scraper/interfaces/IRecordSink';
import { IErrorSink } from './scraper/interfaces/IErrorSink';
import { FetchFailureReason, StaffRecord } from './scraper/interfaces/types';
import { HtmlUtils } from './scraper/utils/HtmlUtils';
import { LoggingUtils } from './scraper/utils/LoggingUtils';
import { ParseError, errorMessage } from '../utils/errors';

export interface DirectoryScraperDependencies {
  fetcher: IPageFetcher;
  strategies: IExtractionStrategy[];
  records: IRecordSink;
  incidents: IErrorSink;
  parse?: (html: string) => CheerioAPI;
}

interface ChainResult {
  strategy: IExtractionStrategy | null;
  records: StaffRecord[];
}

/**
 * Scrapes one staff directory page: fetch, parse, then try each extraction
 * strategy in priority order until one produces records.
 */
export class DirectoryScraperService {
  private readonly logger = LoggingUtils.createTaggedLogger('scraper');
  private readonly parse: (html: string) => CheerioAPI;

  constructor(private readonly deps: DirectoryScraperDependencies) {
    this.parse = deps.parse ?? HtmlUtils.parseDocument;
  }

  /**
   * Scrape a single URL, writing records and incidents to the sinks.
   * @param url The page to scrape
   * @returns Number of records written for this URL (0 on any failure)
   */
  async scrape(url: string): Promise<number> {
    this.logger.info(`Processing URL: ${url}`);

    const outcome = await this.deps.fetcher.fetch(url);
    if (!outcome.ok) {
      if (outcome.reason === FetchFailureReason.RENDERER_FAILED) {
        this.deps.incidents.report({ kind: 'renderer-failed', url, reason: outcome.message });
      } else {
        this.deps.incidents.report({ kind: 'unreachable', url });
      }
      return 0;
    }
    this.logger.debug(`Fetched ${url} via ${outcome.via}`);

    let $: CheerioAPI;
    try {
      $ = this.parse(outcome.html);
    } catch (error) {
      const parseError = new ParseError(url, error);
      this.logger.error(parseError.message, parseError);
      this.deps.incidents.report({
        kind: 'parse-failed',
        url,
        reason: errorMessage(error),
      });
      return 0;
    }

    const { strategy, records } = this.runChain($, url);
    if (!strategy) {
      this.logger.warn(`No data extracted using known formats for ${url}`);
      this.deps.incidents.report({
        kind: 'no-data',
        url,
        strategies: this.deps.strategies.map(s => s.name),
      });
      return 0;
    }

    records.forEach(record => this.deps.records.write(record));
    this.logger.info(`Wrote ${records.length} entries from ${url} (${strategy.name})`);
    return records.length;
  }

  /**
   * First strategy with a non-empty result wins. A strategy that recognizes the
   * structure but finds nobody is indistinguishable from one that does not apply.
   */
  private runChain($: CheerioAPI, url: string): ChainResult {
    for (const strategy of this.deps.strategies) {
      const records = strategy.extract($, url);
      if (records.length > 0) {
        return { strategy, records };
      }
    }
    return { strategy: null, records: [] };
  }
}
