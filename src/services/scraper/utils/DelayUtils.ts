/**
 * Utilities for managing delays in the scraper service
 */
export class DelayUtils {
  /**
   * Creates a promise that resolves after the specified delay
   * @param ms The number of milliseconds to delay
   */
  public static delay(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise<void>(resolve => setTimeout(resolve, ms));
  }
}
