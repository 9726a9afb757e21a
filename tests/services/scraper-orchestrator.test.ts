/**
 * End-to-end tests for the scrape pipeline with stubbed HTTP
 */

jest.mock('node-fetch', () => {
  const actual = jest.requireActual<typeof import('node-fetch')>('node-fetch');
  return { __esModule: true, ...actual, default: jest.fn() };
});

import { access, mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import fetch from 'node-fetch';
import { OPENROUTER_API_URL } from '../../src/services/openrouter-client.js';
import { runPipeline } from '../../src/services/scraper-orchestrator.js';
import { ErrorCode, HTTPStatusError, type ScraperConfig } from '../../src/types/index.js';
import { completionResponse, htmlResponse } from '../helpers/responses.js';
import { createTestLogger } from '../helpers/test-logger.js';

const mockedFetch = jest.mocked(fetch);

const PAGE_URL = 'https://example.com/whats-on';
const TABLE =
  '<table><tr><th>Date</th><th>Event</th><th>Time</th></tr>' +
  '<tr><td>Tuesday 4 March</td><td>Market Day</td><td>8am - 4pm</td></tr></table>';
const PAGE = `<html><head><title>What's on</title></head><body><main><h2>March</h2>${TABLE}</main></body></html>`;
const EVENTS_REPLY = JSON.stringify([
  { date: '2025-03-04', title: 'Market Day', description: null, start_time: '08:00:00', end_time: '16:00:00' },
]);

function stubServices(page: string, replies: string[]): void {
  const queue = [...replies];
  mockedFetch.mockImplementation(async (url) => {
    if (url === OPENROUTER_API_URL) {
      const reply = queue.shift();
      if (reply === undefined) {
        throw new Error('Unexpected completion request');
      }
      return completionResponse(reply);
    }
    return htmlResponse(page);
  });
}

function callsTo(url: string): number {
  return mockedFetch.mock.calls.filter(([calledUrl]) => calledUrl === url).length;
}

async function exists(file: string): Promise<boolean> {
  return access(file).then(
    () => true,
    () => false
  );
}

describe('Scraper Orchestrator', () => {
  let tmpDir: string;
  let config: ScraperConfig;

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), 'orchestrator-'));
    config = {
      source: { url: PAGE_URL, userAgent: 'TestAgent/1.0' },
      ai: { apiKey: 'test-key', model: 'test/model' },
      output: {
        artifactsDir: path.join(tmpDir, 'nested', 'artifacts'),
        htmlFileName: 'events.html',
        icsFileName: 'events.ics',
      },
      ics: { prodId: '-//Test Market//EN', location: 'Test Market Hall' },
      logLevel: 'info',
    };
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('should write the snapshot and the calendar on a first run', async () => {
    const { log } = createTestLogger();
    stubServices(PAGE, ['3', EVENTS_REPLY]);

    const result = await runPipeline(config, log);

    const snapshotPath = path.join(config.output.artifactsDir, 'events.html');
    const icsPath = path.join(config.output.artifactsDir, 'events.ics');
    expect(result).toMatchObject({ status: 'updated', month: 3, eventCount: 1, icsPath, snapshotPath });
    await expect(readFile(snapshotPath, 'utf-8')).resolves.toBe(TABLE);

    const lines = (await readFile(icsPath, 'utf-8')).split('\r\n');
    expect(lines.slice(0, 4)).toEqual(['BEGIN:VCALENDAR', 'VERSION:2.0', 'PRODID:-//Test Market//EN', 'CALSCALE:GREGORIAN']);
    expect(lines).toContain('DTSTART:20250304T080000');
    expect(lines).toContain('DTEND:20250304T160000');
    expect(lines).toContain('DESCRIPTION:');
    expect(lines).toContain('LOCATION:Test Market Hall');
    expect(lines[lines.length - 1]).toBe('END:VCALENDAR');
  });

  it('should fetch the configured URL with the configured user agent', async () => {
    const { log } = createTestLogger();
    stubServices(PAGE, ['3', EVENTS_REPLY]);

    await runPipeline(config, log);

    expect(mockedFetch).toHaveBeenCalledWith(PAGE_URL, { method: 'GET', headers: { 'User-Agent': 'TestAgent/1.0' } });
    expect(callsTo(OPENROUTER_API_URL)).toBe(2);
  });

  it('should skip the completion calls when the page is unchanged', async () => {
    const { log } = createTestLogger();
    stubServices(PAGE, ['3', EVENTS_REPLY]);
    await runPipeline(config, log);
    const icsPath = path.join(config.output.artifactsDir, 'events.ics');
    const firstCalendar = await readFile(icsPath, 'utf-8');

    mockedFetch.mockClear();
    stubServices(PAGE, []);
    const result = await runPipeline(config, log);

    expect(result).toEqual({ status: 'unchanged', snapshotPath: path.join(config.output.artifactsDir, 'events.html') });
    expect(mockedFetch).toHaveBeenCalledTimes(1);
    expect(callsTo(PAGE_URL)).toBe(1);
    expect(callsTo(OPENROUTER_API_URL)).toBe(0);
    await expect(readFile(icsPath, 'utf-8')).resolves.toBe(firstCalendar);
  });

  it('should regenerate the calendar when the table changes', async () => {
    const { log } = createTestLogger();
    stubServices(PAGE, ['3', EVENTS_REPLY]);
    await runPipeline(config, log);

    const changedPage = PAGE.replace('Market Day', 'Vintage Fair');
    const changedReply = EVENTS_REPLY.replace('Market Day', 'Vintage Fair');
    stubServices(changedPage, ['3', changedReply]);
    const result = await runPipeline(config, log);

    expect(result.status).toBe('updated');
    const calendar = await readFile(path.join(config.output.artifactsDir, 'events.ics'), 'utf-8');
    expect(calendar.split('\r\n')).toContain('SUMMARY:Vintage Fair');
  });

  it('should keep the new snapshot but write no calendar when extraction fails', async () => {
    const { log } = createTestLogger();
    stubServices(PAGE, ['3', 'Sorry, I cannot help with that.']);

    await expect(runPipeline(config, log)).rejects.toMatchObject({ code: ErrorCode.PARSE_ERROR });

    await expect(exists(path.join(config.output.artifactsDir, 'events.html'))).resolves.toBe(true);
    await expect(exists(path.join(config.output.artifactsDir, 'events.ics'))).resolves.toBe(false);
  });

  it('should fail before writing anything when the page request fails', async () => {
    const { log, records } = createTestLogger();
    mockedFetch.mockImplementation(async () => htmlResponse('Bad Gateway', 502));

    await expect(runPipeline(config, log)).rejects.toBeInstanceOf(HTTPStatusError);

    await expect(exists(path.join(config.output.artifactsDir, 'events.html'))).resolves.toBe(false);
    expect(records.find((record) => record.msg === 'Scrape pipeline failed')).toMatchObject({
      service: 'orchestrator',
      err: { code: ErrorCode.HTTP_SERVER_ERROR },
    });
  });

  it('should fail when the page has no events table', async () => {
    const { log } = createTestLogger();
    stubServices('<html><body><main><p>Closed for refurbishment</p></main></body></html>', []);

    await expect(runPipeline(config, log)).rejects.toMatchObject({ code: ErrorCode.INVALID_HTML });
    expect(callsTo(OPENROUTER_API_URL)).toBe(0);
  });
});
