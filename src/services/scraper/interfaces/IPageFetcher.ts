import { FetchOutcome } from './types';

/**
 * Retrieves the raw HTML of a page. Implementations report failures through the
 * returned outcome and do not throw for network or HTTP errors.
 */
export interface IPageFetcher {
  fetch(url: string): Promise<FetchOutcome>;
}
