import axios from 'axios';
import { IPageFetcher } from '../interfaces/IPageFetcher';
import { FetchFailureReason, FetchOutcome, HttpFetchOptions } from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Page fetcher using a single plain HTTP GET.
 * Cheap and stateless, but only sees the server-rendered HTML.
 */
export class HttpPageFetcher implements IPageFetcher {
  private readonly logger = LoggingUtils.createTaggedLogger('http');

  constructor(private readonly options: HttpFetchOptions) {}

  /**
   * Fetch a page's HTML
   * @param url The URL to fetch
   * @returns The HTML, or a RequestFailed outcome on any network error, non-2xx status or empty body
   */
  async fetch(url: string): Promise<FetchOutcome> {
    const startTime = Date.now();
    this.logger.debug(`Attempting HTTP fetch for ${url}`);

    try {
      const response = await axios.get<string>(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          'Accept': 'text/html,application/xhtml+xml',
          'Accept-Language': 'en-US,en;q=0.9',
        },
        timeout: this.options.timeoutMs,
        maxRedirects: 5,
        responseType: 'text',
        validateStatus: () => true,
      });

      if (response.status < 200 || response.status >= 300) {
        return this.failure(url, `HTTP ${response.status}`);
      }

      const html = typeof response.data === 'string' ? response.data : '';
      if (!html.trim()) {
        return this.failure(url, `Empty response body (HTTP ${response.status})`);
      }

      this.logger.debug(`HTTP fetch succeeded for ${url} in ${Date.now() - startTime}ms`);
      return { ok: true, html, via: 'http' };
    } catch (error) {
      return this.failure(url, error instanceof Error ? error.message : String(error));
    }
  }

  private failure(url: string, message: string): FetchOutcome {
    this.logger.warn(`HTTP fetch failed for ${url}: ${message}`);
    return { ok: false, reason: FetchFailureReason.REQUEST_FAILED, message };
  }
}
