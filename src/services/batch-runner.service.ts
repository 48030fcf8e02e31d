import { IErrorSink } from './scraper/interfaces/IErrorSink';
import { BatchSummary } from './scraper/interfaces/types';
import { DelayUtils } from './scraper/utils/DelayUtils';
import { LoggingUtils } from './scraper/utils/LoggingUtils';
import { errorMessage } from '../utils/errors';

export interface UrlScraper {
  scrape(url: string): Promise<number>;
}

export interface BatchRunnerOptions {
  /** Pause between URLs; 0 disables it */
  urlDelayMs?: number;
}

/**
 * Runs the scraper over a list of URLs, one at a time and in order. A failure on
 * one URL is recorded and never stops the batch.
 */
export class BatchRunnerService {
  private readonly logger = LoggingUtils.createTaggedLogger('batch');

  constructor(
    private readonly scraper: UrlScraper,
    private readonly incidents: IErrorSink,
    private readonly options: BatchRunnerOptions = {}
  ) {}

  async run(urls: string[]): Promise<BatchSummary> {
    let totalRecords = 0;
    let failedOrEmpty = 0;

    for (const [index, url] of urls.entries()) {
      this.logger.info(`--- URL ${index + 1} of ${urls.length} ---`);

      try {
        const count = await this.scraper.scrape(url);
        if (count > 0) {
          totalRecords += count;
        } else {
          failedOrEmpty += 1;
        }
      } catch (error) {
        const reason = errorMessage(error);
        this.logger.error(`UNEXPECTED ERROR processing ${url}: ${reason}`, error);
        this.incidents.report({ kind: 'unexpected', url, reason });
        failedOrEmpty += 1;
      }

      if (this.options.urlDelayMs && index < urls.length - 1) {
        await DelayUtils.delay(this.options.urlDelayMs);
      }
    }

    const summary: BatchSummary = { totalUrls: urls.length, totalRecords, failedOrEmpty };
    this.logger.info('--- Scraping Complete ---');
    this.logger.info(`Total URLs processed: ${summary.totalUrls}`);
    this.logger.info(`Total staff entries extracted: ${summary.totalRecords}`);
    this.logger.info(`URLs with errors or no data found: ${summary.failedOrEmpty}`);
    return summary;
  }
}
