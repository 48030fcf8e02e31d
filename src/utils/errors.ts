/**
 * Base class for errors the scraper raises on purpose.
 * `isOperational` separates expected failures (missing input, unwritable output,
 * no browser) from programming errors.
 */
export class ScraperError extends Error {
  readonly isOperational: boolean;

  constructor(message: string, options: { cause?: unknown; isOperational?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.isOperational = options.isOperational ?? true;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** The URL list could not be found or read. Fatal for the run. */
export class InputMissingError extends ScraperError {
  constructor(readonly path: string, cause?: unknown) {
    super(`Input file not found or unreadable: ${path} (${errorMessage(cause)})`, { cause });
  }
}

/** The CSV output or the error log could not be opened or written. */
export class OutputSinkError extends ScraperError {
  constructor(readonly path: string, cause?: unknown) {
    super(`Could not open or write to ${path} (${errorMessage(cause)})`, { cause });
  }
}

/** An environment setting has a value that cannot be used. */
export class ConfigError extends ScraperError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
  }
}

export class RendererSetupError extends ScraperError {
  constructor(cause?: unknown) {
    super(`Failed to initialize browser renderer: ${errorMessage(cause)}`, { cause });
  }
}

export class ParseError extends ScraperError {
  constructor(readonly url: string, cause?: unknown) {
    super(`Failed to parse HTML for ${url}: ${errorMessage(cause)}`, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
