import puppeteer, { Browser, Page } from 'puppeteer-core';
import { IRenderSession } from '../interfaces/IRenderSession';
import { RenderOptions } from '../interfaces/types';
import { DelayUtils } from '../utils/DelayUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { RendererSetupError, errorMessage } from '../../../utils/errors';

const logger = LoggingUtils.createTaggedLogger('renderer');

/**
 * Headless Chrome session driven by puppeteer-core.
 * One browser and one tab are opened at launch and reused for every URL, so
 * cookies and cache carry over between pages the way a single desktop session would.
 */
export class PuppeteerRenderSession implements IRenderSession {
  private closed = false;

  private constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly options: RenderOptions
  ) {}

  /**
   * Launch the browser and open the shared tab.
   * Uses the configured executable, or the locally installed stable Chrome.
   * @throws RendererSetupError when the browser cannot be started
   */
  static async launch(options: RenderOptions): Promise<PuppeteerRenderSession> {
    logger.info('Setting up headless browser renderer...');

    let browser: Browser;
    try {
      browser = await puppeteer.launch({
        headless: true,
        executablePath: options.executablePath,
        channel: options.executablePath ? undefined : 'chrome',
        args: [
          '--no-sandbox',
          '--disable-setuid-sandbox',
          '--disable-dev-shm-usage',
          '--disable-gpu',
          '--window-size=1920,1080',
        ],
      });
    } catch (error) {
      throw new RendererSetupError(error);
    }

    try {
      const page = await browser.newPage();
      await page.setUserAgent(options.userAgent);
      await page.setViewport({ width: 1920, height: 1080, deviceScaleFactor: 1 });
      logger.info('Browser renderer setup complete');
      return new PuppeteerRenderSession(browser, page, options);
    } catch (error) {
      await browser.close();
      throw new RendererSetupError(error);
    }
  }

  /**
   * Launch a session, or return null when the browser is disabled or cannot be
   * started. The run then continues with HTTP-only fetching.
   */
  static async tryLaunch(options: RenderOptions & { enabled: boolean }): Promise<IRenderSession | null> {
    if (!options.enabled) {
      logger.warn('Browser renderer disabled; pages will be fetched over HTTP only');
      return null;
    }

    try {
      return await PuppeteerRenderSession.launch(options);
    } catch (error) {
      logger.error(errorMessage(error), error);
      logger.warn('Ensure Chrome is installed or set BROWSER_EXECUTABLE_PATH. Continuing with HTTP-only fetching.');
      return null;
    }
  }

  async render(url: string): Promise<string> {
    if (this.closed) {
      throw new Error('Render session is closed');
    }

    logger.info(`Attempting fetch with browser renderer for ${url} (may take a moment)...`);
    await this.page.goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: this.options.navigationTimeoutMs,
    });
    await this.page.waitForSelector('body', { timeout: this.options.waitTimeoutMs });

    logger.debug(`Page loaded, waiting ${this.options.settleDelayMs}ms for dynamic content...`);
    await DelayUtils.delay(this.options.settleDelayMs);

    const content = await this.page.content();
    logger.info(`Browser render succeeded for ${url}`);
    return content;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    logger.info('Closing browser renderer...');
    try {
      await this.browser.close();
      logger.info('Browser renderer closed');
    } catch (error) {
      logger.error(`Error closing browser: ${errorMessage(error)}`, error);
    }
  }
}
