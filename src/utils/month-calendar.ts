/**
 * Plain-text month grid, embedded in extraction prompts so the model can
 * turn phrases like "every Thursday" into concrete dates
 */
import { format, getDaysInMonth, getISODay } from 'date-fns';

const WEEK_HEADER = 'Mo Tu We Th Fr Sa Su';
const GRID_WIDTH = WEEK_HEADER.length;

/**
 * Render a Monday-first calendar for one month, e.g.
 *
 * ```
 *      March 2025
 * Mo Tu We Th Fr Sa Su
 *                 1  2
 *  3  4  5  6  7  8  9
 * ```
 */
export function formatMonthCalendar(year: number, month: number): string {
  const firstDay = new Date(year, month - 1, 1);
  const title = format(firstDay, 'MMMM yyyy');
  const leftPad = Math.max(0, Math.floor((GRID_WIDTH - title.length) / 2));

  const cells: string[] = Array.from({ length: getISODay(firstDay) - 1 }, () => '  ');
  for (let day = 1; day <= getDaysInMonth(firstDay); day++) {
    cells.push(String(day).padStart(2, ' '));
  }

  const lines = [' '.repeat(leftPad) + title, WEEK_HEADER];
  for (let i = 0; i < cells.length; i += 7) {
    lines.push(cells.slice(i, i + 7).join(' ').trimEnd());
  }

  return lines.join('\n');
}

/**
 * Year of the given month closest to `now`: a January table read in
 * December belongs to next year, a December table read in January to last year.
 */
export function resolveEventsYear(month: number, now: Date = new Date()): number {
  const year = now.getFullYear();
  const offset = month - (now.getMonth() + 1);

  if (offset < -6) return year + 1;
  if (offset > 6) return year - 1;
  return year;
}
