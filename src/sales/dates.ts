/**
 * Calendar dates as `YYYY-MM-DD` strings.
 *
 * A valid string sorts the same way the day it names does, so range
 * checks compare strings directly.
 */

export type IsoDate = string;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Returns the date when `text` is `YYYY-MM-DD` naming a real day
 * (2025-02-30 is rejected), otherwise undefined.
 */
export function parseIsoDate(text: string): IsoDate | undefined {
  const trimmed = text.trim();
  const match = ISO_DATE_PATTERN.exec(trimmed);
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return undefined;

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return trimmed;
}

export function isWithinRange(date: IsoDate, start: IsoDate, end: IsoDate): boolean {
  return date >= start && date <= end;
}
