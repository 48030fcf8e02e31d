export { loadConfig, DEFAULT_USER_AGENT } from './config';
export type { ScraperConfig } from './config';
export * from './utils/errors';
export { parseUrlList, readUrlList } from './utils/url-list';

export * from './services/scraper/interfaces/types';
export type { IPageFetcher } from './services/scraper/interfaces/IPageFetcher';
export type { IRenderSession } from './services/scraper/interfaces/IRenderSession';
export type { IExtractionStrategy } from './services/scraper/interfaces/IExtractionStrategy';
export type { IRecordSink } from './services/scraper/interfaces/IRecordSink';
export type { IErrorSink } from './services/scraper/interfaces/IErrorSink';

export { ContactInfoExtractor, PHONE_PATTERN } from './services/scraper/implementations/ContactInfoExtractor';
export type { ContactInfo } from './services/scraper/implementations/ContactInfoExtractor';
export { HttpPageFetcher } from './services/scraper/implementations/HttpPageFetcher';
export { FallbackPageFetcher } from './services/scraper/implementations/FallbackPageFetcher';
export { PuppeteerRenderSession } from './services/scraper/implementations/PuppeteerRenderSession';
export { CsvRecordSink, CSV_HEADER } from './services/scraper/implementations/CsvRecordSink';
export { TextErrorSink } from './services/scraper/implementations/TextErrorSink';
export { formatIncident } from './services/scraper/implementations/incident-format';
export { VendorTableStrategy } from './services/scraper/strategies/VendorTableStrategy';
export { GenericTableStrategy } from './services/scraper/strategies/GenericTableStrategy';
export { DefinitionListStrategy, splitNameAndTitle } from './services/scraper/strategies/DefinitionListStrategy';
export { ExtractionStrategyFactory, DEFAULT_STRATEGY_ORDER } from './services/scraper/factories/ExtractionStrategyFactory';
export { HtmlUtils } from './services/scraper/utils/HtmlUtils';

export { DirectoryScraperService } from './services/directory-scraper.service';
export { BatchRunnerService } from './services/batch-runner.service';
export { runStaffScrape, withRenderSession } from './services/staff-scrape.service';
