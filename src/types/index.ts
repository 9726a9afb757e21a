/**
 * Core type definitions for the market events ICS scraper
 */
import type { LogLevelString } from 'bunyan';

// =============================================================================
// Core Event Types
// =============================================================================

/**
 * A single dated market event as extracted from the events table
 */
export interface MarketEvent {
  /** Calendar date, `YYYY-MM-DD` */
  date: string;
  title: string;
  description: string | null;
  /** Local time of day, `HH:mm:ss` */
  startTime: string;
  /** Local time of day, `HH:mm:ss` */
  endTime: string;
}

// =============================================================================
// Configuration Types
// =============================================================================

export interface SourceConfiguration {
  url: string;
  userAgent?: string;
}

export interface AIConfiguration {
  apiKey: string;
  model: string;
}

export interface OutputConfiguration {
  artifactsDir: string;
  htmlFileName: string;
  icsFileName: string;
}

export interface ICSOptions {
  prodId: string;
  location: string;
}

export interface ScraperConfig {
  source: SourceConfiguration;
  ai: AIConfiguration;
  output: OutputConfiguration;
  ics: ICSOptions;
  logLevel: LogLevelString;
}

// =============================================================================
// Result Types
// =============================================================================

export type PipelineResult =
  | {
      status: 'unchanged';
      snapshotPath: string;
    }
  | {
      status: 'updated';
      month: number;
      year: number;
      eventCount: number;
      icsPath: string;
      snapshotPath: string;
      durationMs: number;
    };

// =============================================================================
// Error Handling
// =============================================================================

export class ScraperError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: Record<string, unknown>,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'ScraperError';
  }
}

/**
 * Any non-2xx response. `responseBody` holds the server's reply text.
 */
export class HTTPStatusError extends ScraperError {
  constructor(
    public statusCode: number,
    public responseBody: string = '',
    url?: string
  ) {
    super(
      responseBody ? `HTTP Status Error: ${statusCode}. ${responseBody}` : `HTTP Status Error: ${statusCode}.`,
      statusCode >= 400 && statusCode < 500 ? ErrorCode.HTTP_CLIENT_ERROR : ErrorCode.HTTP_SERVER_ERROR,
      { url, statusCode, responseBody },
      statusCode >= 500
    );
    this.name = 'HTTPStatusError';
  }
}

export enum ErrorCode {
  // HTTP errors
  HTTP_CLIENT_ERROR = 'HTTP_CLIENT_ERROR',
  HTTP_SERVER_ERROR = 'HTTP_SERVER_ERROR',

  // Parsing errors
  PARSE_ERROR = 'PARSE_ERROR',
  INVALID_HTML = 'INVALID_HTML',

  // AI errors
  AI_API_ERROR = 'AI_API_ERROR',
  INVALID_COMPLETION = 'INVALID_COMPLETION',

  // Validation errors
  INVALID_EVENT_DATA = 'INVALID_EVENT_DATA',

  // System errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}
