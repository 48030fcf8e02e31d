import * as dotenv from 'dotenv';
import { z } from 'zod';
import logger from '../utils/logger';
import { ConfigError } from '../utils/errors';
import { LogLevel } from '../services/scraper/utils/LoggingUtils';

const result = dotenv.config();
if (result.error) {
  logger.debug(`No .env file loaded: ${result.error.message}`);
} else {
  logger.debug('Environment variables loaded from .env file');
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export interface ScraperConfig {
  paths: {
    input: string;
    output: string;
    errorLog: string;
  };
  http: {
    userAgent: string;
    timeoutMs: number;
  };
  renderer: {
    enabled: boolean;
    executablePath?: string;
    navigationTimeoutMs: number;
    waitTimeoutMs: number;
    settleDelayMs: number;
  };
  batch: {
    urlDelayMs: number;
  };
  logging: {
    level: LogLevel;
  };
}

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];

// Unset and blank variables both fall back to the default
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const text = (fallback: string) => z.preprocess(blankAsUndefined, z.string().default(fallback));
const optionalText = z.preprocess(blankAsUndefined, z.string().optional());
const millis = (fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().nonnegative().default(fallback));
const flag = optionalText.transform(
  value => value !== undefined && TRUE_VALUES.includes(value.trim().toLowerCase())
);

const envSchema = z.object({
  INPUT_PATH: text('target_urls.csv'),
  OUTPUT_PATH: text('staff_directory.csv'),
  ERROR_LOG_PATH: text('scrape_errors.txt'),
  USER_AGENT: text(DEFAULT_USER_AGENT),
  REQUEST_TIMEOUT_MS: millis(15000),
  RENDER_NAVIGATION_TIMEOUT_MS: millis(30000),
  RENDER_WAIT_TIMEOUT_MS: millis(15000),
  RENDER_SETTLE_DELAY_MS: millis(2000),
  BROWSER_EXECUTABLE_PATH: optionalText,
  PUPPETEER_EXECUTABLE_PATH: optionalText,
  DISABLE_RENDERER: flag,
  URL_DELAY_MS: millis(0),
  LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' ? blankAsUndefined(value.toLowerCase()) : value),
    z.nativeEnum(LogLevel).default(LogLevel.INFO)
  ),
});

/**
 * Build the scraper configuration from environment variables.
 * @throws ConfigError when a variable is set to an unusable value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    );
  }

  const vars = parsed.data;
  return {
    paths: {
      input: vars.INPUT_PATH,
      output: vars.OUTPUT_PATH,
      errorLog: vars.ERROR_LOG_PATH,
    },
    http: {
      userAgent: vars.USER_AGENT,
      timeoutMs: vars.REQUEST_TIMEOUT_MS,
    },
    renderer: {
      enabled: !vars.DISABLE_RENDERER,
      executablePath: vars.BROWSER_EXECUTABLE_PATH ?? vars.PUPPETEER_EXECUTABLE_PATH,
      navigationTimeoutMs: vars.RENDER_NAVIGATION_TIMEOUT_MS,
      waitTimeoutMs: vars.RENDER_WAIT_TIMEOUT_MS,
      settleDelayMs: vars.RENDER_SETTLE_DELAY_MS,
    },
    batch: {
      urlDelayMs: vars.URL_DELAY_MS,
    },
    logging: {
      level: vars.LOG_LEVEL,
    },
  };
}
