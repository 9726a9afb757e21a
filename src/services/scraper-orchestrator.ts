/**
 * Scraper Orchestrator Service
 * Runs fetch -> table -> change check -> month -> events -> ICS and persists the outputs
 */
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { PipelineResult, ScraperConfig } from '../types/index.js';
import { createServiceLogger, elapsed, type Logger } from '../utils/logger.js';
import { resolveEventsYear } from '../utils/month-calendar.js';
import { unchanged } from './change-detector.js';
import { extractEventsTable } from './content-preprocessor.js';
import { extractEvents, resolveMonth } from './event-extraction.js';
import { fetchHTML } from './html-fetcher.js';
import { generateICS } from './ics-generator.js';

/**
 * Run the scrape pipeline once.
 *
 * Returns `unchanged` without calling the completion service when the
 * extracted table matches the stored snapshot. The snapshot is written before
 * the completion calls; the ICS file only after every event validates.
 */
export async function runPipeline(config: ScraperConfig, parentLog: Logger): Promise<PipelineResult> {
  const log = createServiceLogger(parentLog, 'orchestrator');
  const startTime = Date.now();
  const { artifactsDir, htmlFileName, icsFileName } = config.output;
  const snapshotPath = path.join(artifactsDir, htmlFileName);
  const icsPath = path.join(artifactsDir, icsFileName);

  log.info({ url: config.source.url, artifactsDir }, 'Starting scrape pipeline');

  try {
    await mkdir(artifactsDir, { recursive: true });

    log.debug('Step 1: Fetching events page');
    const html = await fetchHTML(
      config.source.url,
      config.source.userAgent,
      createServiceLogger(parentLog, 'html-fetcher')
    );

    log.debug('Step 2: Extracting events table');
    const tableHtml = extractEventsTable(html);

    log.debug({ snapshotPath }, 'Step 3: Comparing with snapshot');
    if (await unchanged(snapshotPath, tableHtml)) {
      log.info({ snapshotPath, durationMs: elapsed(startTime) }, 'No changes detected in events table');
      return { status: 'unchanged', snapshotPath };
    }
    await writeFile(snapshotPath, tableHtml, 'utf-8');
    log.debug({ snapshotPath, tableLength: tableHtml.length }, 'Snapshot written');

    const { apiKey, model } = config.ai;

    log.debug('Step 4: Resolving events month');
    const month = await resolveMonth(tableHtml, apiKey, model, createServiceLogger(parentLog, 'event-extraction'));
    const year = resolveEventsYear(month);

    log.debug({ month, year }, 'Step 5: Extracting events');
    const events = await extractEvents(
      tableHtml,
      month,
      apiKey,
      model,
      createServiceLogger(parentLog, 'event-extraction'),
      { year }
    );

    log.debug('Step 6: Generating ICS file');
    const icsContent = generateICS(events, config.ics, createServiceLogger(parentLog, 'ics-generator'));
    await writeFile(icsPath, icsContent, 'utf-8');

    const durationMs = elapsed(startTime);
    log.info({ icsPath, eventCount: events.length, month, year, durationMs }, 'ICS file written');

    return { status: 'updated', month, year, eventCount: events.length, icsPath, snapshotPath, durationMs };
  } catch (error) {
    log.error({ err: error, durationMs: elapsed(startTime) }, 'Scrape pipeline failed');
    throw error;
  }
}
