import { ScraperConfig } from '../config';
import { IPageFetcher } from './scraper/interfaces/IPageFetcher';
import { IRenderSession } from './scraper/interfaces/IRenderSession';
import { IRecordSink } from './scraper/interfaces/IRecordSink';
import { IErrorSink } from './scraper/interfaces/IErrorSink';
import { BatchSummary } from './scraper/interfaces/types';
import { HttpPageFetcher } from './scraper/implementations/HttpPageFetcher';
import { FallbackPageFetcher } from './scraper/implementations/FallbackPageFetcher';
import { PuppeteerRenderSession } from './scraper/implementations/PuppeteerRenderSession';
import { CsvRecordSink } from './scraper/implementations/CsvRecordSink';
import { TextErrorSink } from './scraper/implementations/TextErrorSink';
import { ExtractionStrategyFactory, StrategyFactoryOptions } from './scraper/factories/ExtractionStrategyFactory';
import { LoggingUtils } from './scraper/utils/LoggingUtils';
import { DirectoryScraperService } from './directory-scraper.service';
import { BatchRunnerService } from './batch-runner.service';
import { readUrlList } from '../utils/url-list';

const logger = LoggingUtils.createTaggedLogger('batch');

/**
 * Collaborators of a run that can be swapped out, mainly for tests
 */
export interface StaffScrapeDependencies {
  acquireRenderer: () => Promise<IRenderSession | null>;
  createFetcher: (renderer: IRenderSession | null) => IPageFetcher;
  openRecordSink: (path: string) => IRecordSink;
  openErrorSink: (path: string) => IErrorSink;
}

export interface StaffScrapeOptions extends StrategyFactoryOptions {
  config: ScraperConfig;
}

/**
 * Acquire the render session once, hand it to `use`, and release it on every
 * exit path. A null session (renderer disabled or failed to start) is passed
 * through as is.
 */
export async function withRenderSession<T>(
  acquire: () => Promise<IRenderSession | null>,
  use: (session: IRenderSession | null) => Promise<T>
): Promise<T> {
  const session = await acquire();
  try {
    return await use(session);
  } finally {
    if (session) {
      await session.close();
    }
  }
}

export function defaultDependencies(config: ScraperConfig): StaffScrapeDependencies {
  const renderOptions = { ...config.renderer, userAgent: config.http.userAgent };
  return {
    acquireRenderer: () => PuppeteerRenderSession.tryLaunch(renderOptions),
    createFetcher: renderer => new FallbackPageFetcher(new HttpPageFetcher(config.http), renderer),
    openRecordSink: path => CsvRecordSink.open(path),
    openErrorSink: path => TextErrorSink.open(path),
  };
}

/**
 * Scrape every URL in the configured input file into the configured CSV and
 * error log.
 * @throws InputMissingError when the URL list cannot be read (nothing is started)
 * @throws OutputSinkError when the CSV or the error log cannot be opened
 */
export async function runStaffScrape(
  options: StaffScrapeOptions,
  deps: StaffScrapeDependencies = defaultDependencies(options.config)
): Promise<BatchSummary> {
  const { config } = options;

  const urls = readUrlList(config.paths.input);
  logger.info(`Read ${urls.length} URLs from ${config.paths.input}`);

  return withRenderSession(deps.acquireRenderer, async renderer => {
    const records = deps.openRecordSink(config.paths.output);
    let incidents: IErrorSink;
    try {
      incidents = deps.openErrorSink(config.paths.errorLog);
    } catch (error) {
      records.close();
      throw error;
    }

    try {
      const scraper = new DirectoryScraperService({
        fetcher: deps.createFetcher(renderer),
        strategies: ExtractionStrategyFactory.create({ only: options.only }),
        records,
        incidents,
      });
      const runner = new BatchRunnerService(scraper, incidents, { urlDelayMs: config.batch.urlDelayMs });
      const summary = await runner.run(urls);

      logger.info(`Results saved to: ${config.paths.output}`);
      logger.info(`Errors/Warnings logged to: ${config.paths.errorLog}`);
      return summary;
    } finally {
      records.close();
      incidents.close();
    }
  });
}
