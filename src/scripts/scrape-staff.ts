#!/usr/bin/env node
/**
 * Staff Directory Scraper CLI
 *
 * Reads target URLs (one per line) and writes every staff member found to a CSV
 * file. Pages that could not be fetched or yielded nothing are listed in the
 * error log.
 *
 * @example
 * ```
 * npm run scrape -- --input target_urls.csv --output staff_directory.csv --no-browser
 * ```
 */
import yargs from 'yargs';
import { loadConfig, ScraperConfig } from '../config';
import logger from '../utils/logger';
import { ScraperError } from '../utils/errors';
import { runStaffScrape } from '../services/staff-scrape.service';
import { ExtractionStrategyFactory } from '../services/scraper/factories/ExtractionStrategyFactory';
import { StrategyId } from '../services/scraper/interfaces/types';
import { LogLevel, LoggingUtils } from '../services/scraper/utils/LoggingUtils';

async function main() {
  const config = loadConfig();
  LoggingUtils.setLogLevel(config.logging.level);

  // Filter out the '--' argument that npm adds when running as 'npm run scrape -- --args'
  const filteredArgs = process.argv.slice(2).filter(arg => arg !== '--');

  const argv = yargs(filteredArgs)
    .usage('Usage: $0 [options]')
    .option('input', {
      type: 'string',
      alias: 'i',
      default: config.paths.input,
      describe: 'Text file with one target URL per line'
    })
    .option('output', {
      type: 'string',
      alias: 'o',
      default: config.paths.output,
      describe: 'CSV file the staff records are written to'
    })
    .option('error-log', {
      type: 'string',
      default: config.paths.errorLog,
      describe: 'Text file for fetch failures and pages without data'
    })
    .option('browser', {
      type: 'boolean',
      default: config.renderer.enabled,
      describe: 'Fall back to a headless browser when the plain HTTP fetch fails (disable with --no-browser)'
    })
    .option('only', {
      type: 'string',
      describe: `Comma-separated strategies to try (${Object.values(StrategyId).join(', ')})`,
      coerce: (arg: string) => arg.split(',').map(id => id.trim()).filter(Boolean)
    })
    .option('verbose', {
      type: 'boolean',
      alias: 'v',
      default: false,
      describe: 'Enable debug logging'
    })
    .check((args) => {
      const unknown = (args.only ?? []).filter(id => !ExtractionStrategyFactory.isStrategyId(id));
      if (unknown.length > 0) {
        throw new Error(`Unknown strategy: ${unknown.join(', ')}`);
      }
      return true;
    })
    .help()
    .alias('help', 'h')
    .parseSync();

  if (argv.verbose) {
    LoggingUtils.setLogLevel(LogLevel.DEBUG);
    logger.debug('Verbose logging enabled');
  }

  const runConfig: ScraperConfig = {
    ...config,
    paths: {
      input: argv.input,
      output: argv.output,
      errorLog: argv['error-log'],
    },
    renderer: { ...config.renderer, enabled: argv.browser },
  };

  logger.info('Starting Staff Directory Scraper...');

  try {
    const summary = await runStaffScrape({
      config: runConfig,
      only: (argv.only ?? []).filter(ExtractionStrategyFactory.isStrategyId),
    });

    console.log('\n--- Summary ---');
    console.log(`Total URLs processed: ${summary.totalUrls}`);
    console.log(`Total staff entries extracted: ${summary.totalRecords}`);
    console.log(`URLs with errors or no data found: ${summary.failedOrEmpty}`);
    console.log(`Results saved to: ${runConfig.paths.output}`);
    console.log(`Errors/Warnings logged to: ${runConfig.paths.errorLog}`);
  } catch (error) {
    if (error instanceof ScraperError && error.isOperational) {
      logger.error(`FATAL: ${error.message}`);
    } else {
      logger.error('Unhandled error during scraping:', error);
    }
    console.error(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`);
    process.exit(1);
  }

  logger.info('Script finished.');
}

main().catch(error => {
  logger.error('Unhandled error in scrape-staff script:', error);
  console.error(`Fatal error: ${error instanceof Error ? error.message : 'Unknown error'}`);
  process.exit(1);
});
