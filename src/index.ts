/**
 * Main entry point for the market events ICS scraper
 * Exports all public APIs and utilities
 */

// Core services
export { fetchHTML } from './services/html-fetcher.js';
export { extractEventsTable } from './services/content-preprocessor.js';
export { complete, OPENROUTER_API_URL } from './services/openrouter-client.js';
export { resolveMonth, extractEvents } from './services/event-extraction.js';
export { generateICS, formatFloatingDateTime, formatUtcStamp } from './services/ics-generator.js';
export { unchanged } from './services/change-detector.js';
export { runPipeline } from './services/scraper-orchestrator.js';

// Utilities
export { loadConfig } from './utils/config.js';
export { formatMonthCalendar, resolveEventsYear } from './utils/month-calendar.js';
export { createRunLogger, createServiceLogger, generateRunId, getRootLogger } from './utils/logger.js';

// Type definitions
export type {
  MarketEvent,
  SourceConfiguration,
  AIConfiguration,
  OutputConfiguration,
  ICSOptions,
  ScraperConfig,
  PipelineResult,
} from './types/index.js';
export type { ExtractionOptions } from './services/event-extraction.js';
export type { GenerateICSOptions } from './services/ics-generator.js';
export type { Logger } from './utils/logger.js';

export { ScraperError, HTTPStatusError, ErrorCode } from './types/index.js';

// Version
export const VERSION = '1.0.0';

/**
 * Default export: run the pipeline once
 */
export { runPipeline as default } from './services/scraper-orchestrator.js';
