import logger from '../../../utils/logger';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  NONE = 'none'
}

const ORDERED_LEVELS = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Level-filtered logging for the scraper, with an optional `[tag]` prefix per
 * component.
 */
export class LoggingUtils {
  private static currentLevel: LogLevel = LogLevel.INFO;

  /**
   * Sets the minimum level that is logged. The winston logger follows along so
   * that debug output is not filtered a second time.
   */
  static setLogLevel(level: LogLevel): void {
    this.currentLevel = level;
    if (level !== LogLevel.NONE) {
      logger.level = level;
    }
  }

  static debug(message: string, tag?: string): void {
    this.log(LogLevel.DEBUG, message, tag);
  }

  static info(message: string, tag?: string): void {
    this.log(LogLevel.INFO, message, tag);
  }

  static warn(message: string, tag?: string): void {
    this.log(LogLevel.WARN, message, tag);
  }

  /**
   * Log an error message. When `cause` is an Error its name and stack go along
   * as metadata.
   */
  static error(message: string, tag?: string, cause?: unknown): void {
    const meta = cause instanceof Error ? { name: cause.name, stack: cause.stack } : undefined;
    this.log(LogLevel.ERROR, message, tag, meta);
  }

  private static log(level: LogLevel, message: string, tag?: string, meta?: object): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const line = tag ? `[${tag}] ${message}` : message;
    switch (level) {
      case LogLevel.DEBUG:
        logger.debug(line);
        break;
      case LogLevel.INFO:
        logger.info(line);
        break;
      case LogLevel.WARN:
        logger.warn(line);
        break;
      case LogLevel.ERROR:
        if (meta) {
          logger.error(line, meta);
        } else {
          logger.error(line);
        }
        break;
    }
  }

  private static isEnabled(level: LogLevel): boolean {
    if (this.currentLevel === LogLevel.NONE) {
      return false;
    }
    return ORDERED_LEVELS.indexOf(level) >= ORDERED_LEVELS.indexOf(this.currentLevel);
  }

  /**
   * Logger bound to one component tag
   */
  static createTaggedLogger(tag: string) {
    return {
      debug: (message: string) => LoggingUtils.debug(message, tag),
      info: (message: string) => LoggingUtils.info(message, tag),
      warn: (message: string) => LoggingUtils.warn(message, tag),
      error: (message: string, cause?: unknown) => LoggingUtils.error(message, tag, cause),
    };
  }
}
