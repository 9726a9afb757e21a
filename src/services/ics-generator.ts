/**
 * ICS File Generation Service
 * Renders market events as an iCalendar document with floating local times
 */
import { randomUUID } from 'node:crypto';
import { formatInTimeZone } from 'date-fns-tz';
import type { ICSOptions, MarketEvent } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { DEFAULT_LOCATION, DEFAULT_PROD_ID } from '../utils/config.js';

const DEFAULT_ICS_OPTIONS: ICSOptions = {
  prodId: DEFAULT_PROD_ID,
  location: DEFAULT_LOCATION,
};

export interface GenerateICSOptions extends Partial<ICSOptions> {
  /** Creation time stamped on every event (DTSTAMP) */
  now?: Date;
  generateUid?: () => string;
}

const CRLF = '\r\n';

/**
 * `2025-03-04` + `08:00:00` -> `20250304T080000`
 */
export function formatFloatingDateTime(date: string, time: string): string {
  return `${date.replace(/-/g, '')}T${time.replace(/:/g, '')}`;
}

/**
 * UTC basic-format timestamp, e.g. `20250304T071500Z`
 */
export function formatUtcStamp(instant: Date): string {
  return formatInTimeZone(instant, 'UTC', "yyyyMMdd'T'HHmmss'Z'");
}

function buildEventLines(event: MarketEvent, uid: string, stamp: string, location: string): string[] {
  // Only newlines are escaped; commas and semicolons pass through as-is
  const description = (event.description ?? '').replace(/\n/g, '\\n');

  return [
    'BEGIN:VEVENT',
    `UID:${uid}`,
    `DTSTAMP:${stamp}`,
    `DTSTART:${formatFloatingDateTime(event.date, event.startTime)}`,
    `DTEND:${formatFloatingDateTime(event.date, event.endTime)}`,
    `SUMMARY:${event.title}`,
    `DESCRIPTION:${description}`,
    `LOCATION:${location}`,
    'END:VEVENT',
  ];
}

/**
 * Generate ICS text from events, one VEVENT per event in input order
 */
export function generateICS(events: MarketEvent[], options: GenerateICSOptions, log: Logger): string {
  const { now = new Date(), generateUid = randomUUID, ...icsOptions } = options;
  const config: ICSOptions = { ...DEFAULT_ICS_OPTIONS, ...icsOptions };
  const stamp = formatUtcStamp(now);

  const lines = ['BEGIN:VCALENDAR', 'VERSION:2.0', `PRODID:${config.prodId}`, 'CALSCALE:GREGORIAN'];
  for (const event of events) {
    lines.push(...buildEventLines(event, generateUid(), stamp, config.location));
  }
  lines.push('END:VCALENDAR');

  const icsContent = lines.join(CRLF);
  log.info({ eventCount: events.length, icsLength: icsContent.length }, 'ICS generation complete');

  return icsContent;
}
