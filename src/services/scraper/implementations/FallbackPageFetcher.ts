import { IPageFetcher } from '../interfaces/IPageFetcher';
import { IRenderSession } from '../interfaces/IRenderSession';
import { FetchFailureReason, FetchOutcome } from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';
import { errorMessage } from '../../../utils/errors';

/**
 * Tries the lightweight fetcher first and falls back to the browser render
 * session when it fails. The render session is owned by the caller.
 */
export class FallbackPageFetcher implements IPageFetcher {
  private readonly logger = LoggingUtils.createTaggedLogger('fetcher');

  /**
   * @param primary Lightweight fetcher tried first
   * @param renderer Browser session for the fallback, or null when none could be started
   */
  constructor(
    private readonly primary: IPageFetcher,
    private readonly renderer: IRenderSession | null
  ) {}

  async fetch(url: string): Promise<FetchOutcome> {
    const direct = await this.primary.fetch(url);
    if (direct.ok) {
      return direct;
    }

    if (!this.renderer) {
      this.logger.warn(`HTTP fetch failed and browser renderer is not available. Skipping ${url}`);
      return {
        ok: false,
        reason: FetchFailureReason.RENDERER_UNAVAILABLE,
        message: `HTTP request failed (${direct.message}) and no browser renderer is available`,
      };
    }

    this.logger.info(`HTTP fetch failed (${direct.message}). Will try browser renderer.`);
    try {
      const html = await this.renderer.render(url);
      return { ok: true, html, via: 'renderer' };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(`Browser renderer also failed for ${url}: ${message}`);
      return { ok: false, reason: FetchFailureReason.RENDERER_FAILED, message };
    }
  }
}
