/**
 * HTML Fetcher Service
 * Single GET of the events page; any non-2xx status is fatal
 */

import fetch from 'node-fetch';
import { HTTPStatusError } from '../types/index.js';
import { elapsed, type Logger } from '../utils/logger.js';

/**
 * Fetch a page and return its body as text.
 *
 * The `User-Agent` header is only sent when `userAgent` is given.
 * Transport failures propagate unchanged; there are no retries.
 *
 * @throws {HTTPStatusError} when the response status is not 2xx
 */
export async function fetchHTML(url: string, userAgent: string | undefined, log: Logger): Promise<string> {
  const headers: Record<string, string> = {};
  if (userAgent) {
    headers['User-Agent'] = userAgent;
  }

  const startTime = Date.now();
  log.debug({ url, userAgent }, 'Fetching HTML');

  const response = await fetch(url, { method: 'GET', headers });
  const body = await response.text();

  if (!response.ok) {
    log.error({ url, statusCode: response.status, durationMs: elapsed(startTime) }, 'Fetch failed');
    throw new HTTPStatusError(response.status, body, url);
  }

  log.info({ url, statusCode: response.status, bytes: body.length, durationMs: elapsed(startTime) }, 'HTML fetched');
  return body;
}
