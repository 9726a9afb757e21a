/**
 * Event extraction via the completion service
 * Two round-trips: which month the table covers, then the events themselves
 */
import { isValid, parse } from 'date-fns';
import { z } from 'zod';
import { ErrorCode, type MarketEvent, ScraperError } from '../types/index.js';
import { formatMonthCalendar, resolveEventsYear } from '../utils/month-calendar.js';
import { createServiceLogger, type Logger } from '../utils/logger.js';
import { complete } from './openrouter-client.js';

export interface ExtractionOptions {
  /** Year the month grid is drawn for; defaults to the year nearest today */
  year?: number;
}

const MONTH_PROMPT = `Which month of the year are the events in this HTML calendar for?
Reply with the number of the month, from 1 to 12, where 1 is January, 2 is February
and so on.

Reply with the number only, no commentary or anything else.

Here is the HTML:

\`\`\`html
{{table}}
\`\`\``;

const EVENTS_PROMPT = `Convert the following HTML table of events into a JSON array. Reply with
the JSON only, no commentary and no code fences.

Each element of the array must be an object with these fields:

- date: ISO date, e.g. "2025-03-04"
- title (from the Event column): string
- description (from the Event column): string OR null
- start_time (first half of the Time column): ISO time, e.g. "08:00:00"
- end_time (second half of the Time column): ISO time, e.g. "16:00:00"

If an event repeats through the month (e.g. "every Thursday"), create one object
for every date it falls on. Use this calendar of the month as a reference:

{{calendar}}

Here is the HTML:

\`\`\`html
{{table}}
\`\`\``;

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d)(?:\.\d+)?)?$/;

const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected an ISO date (YYYY-MM-DD)')
  .refine((value) => isValid(parse(value, 'yyyy-MM-dd', new Date())), 'Not a real calendar date');

const IsoTimeSchema = z
  .string()
  .regex(TIME_PATTERN, 'Expected an ISO time (HH:mm or HH:mm:ss)')
  .transform((value) => {
    const [, hours, minutes, seconds] = TIME_PATTERN.exec(value) ?? [];
    return `${hours}:${minutes}:${seconds ?? '00'}`;
  });

/**
 * One element of the completion reply; snake_case on the wire
 */
const ExtractedEventSchema = z
  .object({
    date: IsoDateSchema,
    title: z.string(),
    description: z.string().nullish(),
    start_time: IsoTimeSchema,
    end_time: IsoTimeSchema,
  })
  .transform(
    (event): MarketEvent => ({
      date: event.date,
      title: event.title,
      description: event.description ?? null,
      startTime: event.start_time,
      endTime: event.end_time,
    })
  );

function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) => values[key] ?? placeholder);
}

/**
 * Ask which month (1-12) the events table covers.
 *
 * @throws {ScraperError} INVALID_COMPLETION when the reply is not an integer from 1 to 12
 */
export async function resolveMonth(tableHtml: string, apiKey: string, model: string, log: Logger): Promise<number> {
  const reply = await complete(
    fillTemplate(MONTH_PROMPT, { table: tableHtml }),
    model,
    apiKey,
    createServiceLogger(log, 'openrouter')
  );
  const trimmed = reply.trim();

  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new ScraperError(`Month reply is not an integer: "${reply}"`, ErrorCode.INVALID_COMPLETION, { reply });
  }

  const month = Number.parseInt(trimmed, 10);
  if (month < 1 || month > 12) {
    throw new ScraperError(`Month reply is out of range 1-12: ${month}`, ErrorCode.INVALID_COMPLETION, { reply });
  }

  log.info({ month }, 'Events month resolved');
  return month;
}

/**
 * Convert the events table into dated events.
 *
 * The reply must be a bare JSON array; every element is validated and the
 * first invalid one fails the whole extraction.
 *
 * @throws {ScraperError} PARSE_ERROR on malformed JSON, INVALID_EVENT_DATA on schema mismatch
 */
export async function extractEvents(
  tableHtml: string,
  month: number,
  apiKey: string,
  model: string,
  log: Logger,
  options: ExtractionOptions = {}
): Promise<MarketEvent[]> {
  const year = options.year ?? resolveEventsYear(month);
  const prompt = fillTemplate(EVENTS_PROMPT, {
    calendar: formatMonthCalendar(year, month),
    table: tableHtml,
  });

  const reply = await complete(prompt, model, apiKey, createServiceLogger(log, 'openrouter'));

  let parsed: unknown;
  try {
    parsed = JSON.parse(reply);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ScraperError(`Events reply is not valid JSON: ${message}`, ErrorCode.PARSE_ERROR, { reply });
  }

  if (!Array.isArray(parsed)) {
    throw new ScraperError('Events reply is not a JSON array', ErrorCode.INVALID_EVENT_DATA, { reply });
  }

  const events = parsed.map((element: unknown, eventIndex) => {
    const result = ExtractedEventSchema.safeParse(element);
    if (!result.success) {
      throw new ScraperError(`Event at index ${eventIndex} failed validation`, ErrorCode.INVALID_EVENT_DATA, {
        eventIndex,
        event: element,
        issues: result.error.issues,
      });
    }
    return result.data;
  });

  events.forEach((event, eventIndex) => {
    if (event.endTime < event.startTime) {
      log.warn({ eventIndex, event }, 'Event ends before it starts');
    }
  });

  log.info({ eventCount: events.length, month, year }, 'Events extracted');
  return events;
}
