import { IPageFetcher } from '../../interfaces/IPageFetcher';
import { FetchFailureReason, FetchOutcome } from '../../interfaces/types';

/**
 * Serves canned HTML by URL. Unknown URLs fail as if the renderer was unavailable.
 */
export class StaticPageFetcher implements IPageFetcher {
  readonly requested: string[] = [];

  constructor(private readonly pages: Record<string, string | FetchOutcome>) {}

  async fetch(url: string): Promise<FetchOutcome> {
    this.requested.push(url);
    const page = this.pages[url];
    if (page === undefined) {
      return {
        ok: false,
        reason: FetchFailureReason.RENDERER_UNAVAILABLE,
        message: `no page registered for ${url}`,
      };
    }
    return typeof page === 'string' ? { ok: true, html: page, via: 'http' } : page;
  }
}
