import { mock, MockProxy } from 'jest-mock-extended';
import { FallbackPageFetcher } from '../FallbackPageFetcher';
import { IPageFetcher } from '../../interfaces/IPageFetcher';
import { IRenderSession } from '../../interfaces/IRenderSession';
import { FetchFailureReason } from '../../interfaces/types';

describe('FallbackPageFetcher', () => {
  const url = 'https://athletics.example.edu/staff';
  let primary: MockProxy<IPageFetcher>;
  let renderer: MockProxy<IRenderSession>;

  beforeEach(() => {
    primary = mock<IPageFetcher>();
    renderer = mock<IRenderSession>();
  });

  it('should return the HTTP result without touching the renderer', async () => {
    primary.fetch.mockResolvedValue({ ok: true, html: '<p>hi</p>', via: 'http' });
    const fetcher = new FallbackPageFetcher(primary, renderer);

    await expect(fetcher.fetch(url)).resolves.toEqual({ ok: true, html: '<p>hi</p>', via: 'http' });
    expect(renderer.render).not.toHaveBeenCalled();
  });

  it('should fall back to the renderer when HTTP fails', async () => {
    primary.fetch.mockResolvedValue({ ok: false, reason: FetchFailureReason.REQUEST_FAILED, message: 'HTTP 403' });
    renderer.render.mockResolvedValue('<html><body>rendered</body></html>');
    const fetcher = new FallbackPageFetcher(primary, renderer);

    const outcome = await fetcher.fetch(url);

    expect(outcome).toEqual({ ok: true, html: '<html><body>rendered</body></html>', via: 'renderer' });
    expect(renderer.render).toHaveBeenCalledWith(url);
  });

  it('should report RendererFailed when the renderer throws', async () => {
    primary.fetch.mockResolvedValue({ ok: false, reason: FetchFailureReason.REQUEST_FAILED, message: 'HTTP 403' });
    renderer.render.mockRejectedValue(new Error('Navigation timeout of 30000 ms exceeded'));
    const fetcher = new FallbackPageFetcher(primary, renderer);

    const outcome = await fetcher.fetch(url);

    expect(outcome).toEqual({
      ok: false,
      reason: FetchFailureReason.RENDERER_FAILED,
      message: 'Navigation timeout of 30000 ms exceeded',
    });
  });

  it('should report RendererUnavailable when there is no renderer', async () => {
    primary.fetch.mockResolvedValue({ ok: false, reason: FetchFailureReason.REQUEST_FAILED, message: 'HTTP 500' });
    const fetcher = new FallbackPageFetcher(primary, null);

    const outcome = await fetcher.fetch(url);

    expect(outcome).toEqual({
      ok: false,
      reason: FetchFailureReason.RENDERER_UNAVAILABLE,
      message: 'HTTP request failed (HTTP 500) and no browser renderer is available',
    });
  });
});
