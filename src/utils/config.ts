import { z } from 'zod';
import { ErrorCode, type ScraperConfig, ScraperError } from '../types/index.js';
import type { LogLevelString } from './logger.js';

export const DEFAULT_MODEL = 'deepseek/deepseek-chat-v3.1:free';
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 15.7; rv:143.0) Gecko/20100101 Firefox/143.0';
export const DEFAULT_LOCATION = 'Leeds Kirkgate Market, Kirkgate, Leeds LS2 7HY, UK';
export const DEFAULT_PROD_ID = '-//Market Events ICS//EN';

/**
 * Level names accepted in LOG_LEVEL that bunyan does not know
 */
const LOG_LEVEL_ALIASES: Record<string, LogLevelString> = {
  success: 'info',
  warning: 'warn',
  critical: 'fatal',
};

const BunyanLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

const LogLevelSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .transform((value) => LOG_LEVEL_ALIASES[value] ?? value)
  .pipe(BunyanLevelSchema);

const EnvSchema = z.object({
  EVENTS_PAGE_URL: z.string({ required_error: 'EVENTS_PAGE_URL is required' }).url('EVENTS_PAGE_URL must be a valid URL'),
  OPENROUTER_API_KEY: z
    .string({ required_error: 'OPENROUTER_API_KEY is required' })
    .min(1, 'OPENROUTER_API_KEY must not be empty'),
  OPENROUTER_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  ARTIFACTS_DIR: z.string().min(1).default('artifacts'),
  HTML_FILE_NAME: z.string().min(1).default('events.html'),
  ICS_FILE_NAME: z.string().min(1).default('events.ics'),
  SCRAPER_USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  EVENT_LOCATION: z.string().default(DEFAULT_LOCATION),
  CALENDAR_PROD_ID: z.string().min(1).default(DEFAULT_PROD_ID),
  LOG_LEVEL: LogLevelSchema.default('debug'),
});

/**
 * Build the scraper configuration from environment variables.
 * Called once at start-up; the result is passed down explicitly.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ScraperError(
      `Invalid configuration: ${issues.join('; ')}`,
      ErrorCode.CONFIGURATION_ERROR,
      { issues },
      false
    );
  }

  const vars = parsed.data;

  return {
    source: {
      url: vars.EVENTS_PAGE_URL,
      // An empty SCRAPER_USER_AGENT sends no User-Agent header at all
      userAgent: vars.SCRAPER_USER_AGENT || undefined,
    },
    ai: {
      apiKey: vars.OPENROUTER_API_KEY,
      model: vars.OPENROUTER_MODEL,
    },
    output: {
      artifactsDir: vars.ARTIFACTS_DIR,
      htmlFileName: vars.HTML_FILE_NAME,
      icsFileName: vars.ICS_FILE_NAME,
    },
    ics: {
      prodId: vars.CALENDAR_PROD_ID,
      location: vars.EVENT_LOCATION,
    },
    logLevel: vars.LOG_LEVEL,
  };
}
