import fs from 'fs';
import os from 'os';
import path from 'path';
import { mock, MockProxy } from 'jest-mock-extended';
import { ScraperConfig } from '../../config';
import { runStaffScrape, StaffScrapeDependencies, withRenderSession } from '../../services/staff-scrape.service';
import { IPageFetcher } from '../../services/scraper/interfaces/IPageFetcher';
import { IRenderSession } from '../../services/scraper/interfaces/IRenderSession';
import { CsvRecordSink } from '../../services/scraper/implementations/CsvRecordSink';
import { TextErrorSink } from '../../services/scraper/implementations/TextErrorSink';
import { StrategyId } from '../../services/scraper/interfaces/types';
import { StaticPageFetcher } from '../../services/scraper/test-utils/mocks/StaticPageFetcher';
import { InMemoryRecordSink } from '../../services/scraper/test-utils/mocks/InMemorySinks';
import { DEFINITION_LIST_PAGE, vendorTablePage } from '../../services/scraper/test-utils/fixtures';
import { InputMissingError, OutputSinkError } from '../../utils/errors';
import { LogLevel } from '../../services/scraper/utils/LoggingUtils';

const VENDOR_URL = 'https://athletics.example.edu/staff';
const DOWN_URL = 'https://down.example.edu/staff';

describe('runStaffScrape', () => {
  let dir: string;
  let config: ScraperConfig;
  let renderer: MockProxy<IRenderSession>;
  let fetcher: StaticPageFetcher;
  let deps: StaffScrapeDependencies;
  let acquireRenderer: jest.Mock<Promise<IRenderSession | null>, []>;
  let createFetcher: jest.Mock<IPageFetcher, [IRenderSession | null]>;

  const writeInput = (content: string) => fs.writeFileSync(config.paths.input, content, 'utf8');

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'staff-scrape-'));
    config = {
      paths: {
        input: path.join(dir, 'target_urls.csv'),
        output: path.join(dir, 'staff_directory.csv'),
        errorLog: path.join(dir, 'scrape_errors.txt'),
      },
      http: { userAgent: 'test-agent', timeoutMs: 1000 },
      renderer: { enabled: true, navigationTimeoutMs: 1000, waitTimeoutMs: 1000, settleDelayMs: 0 },
      batch: { urlDelayMs: 0 },
      logging: { level: LogLevel.INFO },
    };

    renderer = mock<IRenderSession>();
    renderer.close.mockResolvedValue(undefined);
    fetcher = new StaticPageFetcher({
      [VENDOR_URL]: vendorTablePage([
        { name: 'Ava Stone', title: 'Head Coach', email: 'astone@example.edu', phone: '555-300-1000' },
        { name: 'Ben Ortiz', title: 'Assistant Coach, Offense' },
      ]),
      'https://school.example.org/staff': DEFINITION_LIST_PAGE,
    });
    acquireRenderer = jest.fn<Promise<IRenderSession | null>, []>().mockResolvedValue(renderer);
    createFetcher = jest.fn<IPageFetcher, [IRenderSession | null]>().mockReturnValue(fetcher);
    deps = {
      acquireRenderer,
      createFetcher,
      openRecordSink: file => CsvRecordSink.open(file),
      openErrorSink: file => TextErrorSink.open(file),
    };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should write records and incidents for every URL in the input file', async () => {
    writeInput(`\uFEFFURL\r\n${VENDOR_URL}\r\n\r\n${DOWN_URL}\r\n`);

    const summary = await runStaffScrape({ config }, deps);

    expect(summary).toEqual({ totalUrls: 2, totalRecords: 2, failedOrEmpty: 1 });
    expect(fetcher.requested).toEqual([VENDOR_URL, DOWN_URL]);
    expect(createFetcher).toHaveBeenCalledWith(renderer);
    expect(fs.readFileSync(config.paths.output, 'utf8')).toBe([
      'Name,Email,Position/Title,Phone,Sport/Department,Source URL',
      `Ava Stone,astone@example.edu,Head Coach,555-300-1000,,${VENDOR_URL}`,
      `Ben Ortiz,,"Assistant Coach, Offense",,,${VENDOR_URL}`,
      '',
    ].join('\n'));
    expect(fs.readFileSync(config.paths.errorLog, 'utf8')).toBe(
      `ERROR: Could not fetch URL (HTTP request failed, no browser renderer): ${DOWN_URL}\n-------\n`
    );
    expect(renderer.close).toHaveBeenCalledTimes(1);
  });

  it('should leave only the header and an empty log for an input without URLs', async () => {
    writeInput('URL\n');

    const summary = await runStaffScrape({ config }, deps);

    expect(summary).toEqual({ totalUrls: 0, totalRecords: 0, failedOrEmpty: 0 });
    expect(fs.readFileSync(config.paths.output, 'utf8')).toBe(
      'Name,Email,Position/Title,Phone,Sport/Department,Source URL\n'
    );
    expect(fs.readFileSync(config.paths.errorLog, 'utf8')).toBe('');
  });

  it('should restrict extraction to the selected strategies', async () => {
    writeInput(`${VENDOR_URL}\n`);

    const summary = await runStaffScrape({ config, only: [StrategyId.DEFINITION_LIST] }, deps);

    expect(summary).toEqual({ totalUrls: 1, totalRecords: 0, failedOrEmpty: 1 });
    expect(fs.readFileSync(config.paths.errorLog, 'utf8')).toBe([
      `WARNING: No staff data extracted from URL: ${VENDOR_URL}`,
      '         (Tried Definition List formats)',
      '-------',
      '',
    ].join('\n'));
  });

  it('should fail before starting the renderer when the input file is missing', async () => {
    await expect(runStaffScrape({ config }, deps)).rejects.toThrow(InputMissingError);

    expect(acquireRenderer).not.toHaveBeenCalled();
    expect(fs.existsSync(config.paths.output)).toBe(false);
  });

  it('should release the renderer when the output cannot be opened', async () => {
    writeInput(`${VENDOR_URL}\n`);
    config.paths.output = path.join(dir, 'missing-dir', 'staff_directory.csv');

    await expect(runStaffScrape({ config }, deps)).rejects.toThrow(OutputSinkError);

    expect(renderer.close).toHaveBeenCalledTimes(1);
    expect(fetcher.requested).toEqual([]);
  });

  it('should close the record sink when the error log cannot be opened', async () => {
    writeInput(`${VENDOR_URL}\n`);
    const records = new InMemoryRecordSink();
    deps.openRecordSink = () => records;
    config.paths.errorLog = path.join(dir, 'missing-dir', 'scrape_errors.txt');

    await expect(runStaffScrape({ config }, deps)).rejects.toThrow(OutputSinkError);

    expect(records.closed).toBe(true);
    expect(renderer.close).toHaveBeenCalledTimes(1);
  });

  it('should run without a renderer when none could be started', async () => {
    writeInput(`${DOWN_URL}\n`);
    acquireRenderer.mockResolvedValue(null);

    const summary = await runStaffScrape({ config }, deps);

    expect(summary.failedOrEmpty).toBe(1);
    expect(createFetcher).toHaveBeenCalledWith(null);
    expect(renderer.close).not.toHaveBeenCalled();
  });
});

describe('withRenderSession', () => {
  it('should close the session when the work throws', async () => {
    const session = mock<IRenderSession>();
    session.close.mockResolvedValue(undefined);

    await expect(
      withRenderSession(async () => session, async () => {
        throw new Error('sink exploded');
      })
    ).rejects.toThrow('sink exploded');

    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it('should pass a missing session through to the work', async () => {
    const use = jest.fn(async (session: IRenderSession | null) => (session === null ? 'http-only' : 'rendered'));

    await expect(withRenderSession(async () => null, use)).resolves.toBe('http-only');
  });
});
