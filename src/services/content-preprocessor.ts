/**
 * Content Preprocessor Service
 * Narrows the fetched page down to the events table
 */
import * as cheerio from 'cheerio';
import { ErrorCode, ScraperError } from '../types/index.js';

/**
 * Return the outer HTML of the first `<table>` inside the first `<main>`.
 *
 * A page without either landmark fails loudly: the page layout is an
 * external contract and a change to it should stop the run.
 *
 * @throws {ScraperError} INVALID_HTML when `<main>` or its `<table>` is missing
 */
export function extractEventsTable(html: string): string {
  // htmlparser2 backend: keeps the markup as written (no implied <tbody>, entities untouched)
  const $ = cheerio.load(html, { xml: { xmlMode: false, decodeEntities: false } });

  const main = $('main').first();
  if (main.length === 0) {
    throw new ScraperError('No <main> element found in page', ErrorCode.INVALID_HTML, { landmark: 'main' });
  }

  const table = main.find('table').first();
  if (table.length === 0) {
    throw new ScraperError('No <table> element found inside <main>', ErrorCode.INVALID_HTML, {
      landmark: 'main table',
    });
  }

  return $.html(table);
}
