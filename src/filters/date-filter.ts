/**
 * Date Filter - keep records whose sale date falls inside an inclusive range
 */

import { createLogger } from '../utils/logger.js';
import { isWithinRange, parseIsoDate } from '../sales/dates.js';
import { InvalidDateError, InvalidRangeError } from '../sales/errors.js';
import type { DateRange, SaleRecord } from '../sales/types.js';

const logger = createLogger('date-filter');

/**
 * Build a range from user input. Both bounds must be valid `YYYY-MM-DD`
 * dates and start must not be after end.
 */
export function createDateRange(start: string, end: string): DateRange {
  const startDate = parseIsoDate(start);
  if (!startDate) throw new InvalidDateError(start, 'Start date');
  const endDate = parseIsoDate(end);
  if (!endDate) throw new InvalidDateError(end, 'End date');
  if (startDate > endDate) throw new InvalidRangeError(startDate, endDate);
  return { start: startDate, end: endDate };
}

/**
 * Without a range the records pass through untouched. With one, records
 * that carry no sale date are excluded, so filtering a dateless file
 * yields nothing.
 */
export function filterByDateRange(records: SaleRecord[], range?: DateRange): SaleRecord[] {
  if (!range) return records;

  const { start, end } = createDateRange(range.start, range.end);
  const filtered = records.filter(
    (record) => record.saleDate !== undefined && isWithinRange(record.saleDate, start, end),
  );

  const undated = records.filter((record) => record.saleDate === undefined).length;
  if (undated > 0) {
    logger.warn({ undated }, 'Records without a sale date excluded by date filter');
  }
  logger.info({ start, end, before: records.length, after: filtered.length }, 'Date filter applied');

  return filtered;
}
