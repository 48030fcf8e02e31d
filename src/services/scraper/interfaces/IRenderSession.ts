/**
 * A long-lived headless browser session that renders pages one at a time.
 * Not safe for concurrent use.
 */
export interface IRenderSession {
  /**
   * Navigate to a URL, wait for the page to be ready and return the rendered HTML.
   * Throws when navigation or the readiness wait fails.
   */
  render(url: string): Promise<string>;

  /**
   * Release the browser. Calling it more than once has no further effect.
   */
  close(): Promise<void>;
}
