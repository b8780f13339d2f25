/**
 * Row normalisation
 *
 * Turns loosely-shaped rows (JSON objects, CSV records) into validated
 * PricePoints. Accepts the field spellings price exports commonly use.
 */

import { format, isValid, parse } from 'date-fns';
import { SeriesFormatError } from '../errors';
import type { IsoDate, PricePoint } from '../types';

const DATE_KEYS = ['date', 'Date', 'DATE'];

// Adjusted close wins when present, otherwise plain close
const CLOSE_KEYS = [
  'closePrice',
  'close_price',
  'adjusted_close',
  'adjClose',
  'Adj Close',
  'close',
  'Close',
  'CLOSE',
];

const DATE_FORMATS = ['yyyy-MM-dd', 'MM/dd/yyyy', 'M/d/yyyy'];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readField(row: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = row[key];
    if (value !== undefined && value !== null && value !== '') {
      return value;
    }
  }
  return undefined;
}

/**
 * Parse a calendar date in one of the accepted formats into YYYY-MM-DD.
 * A full ISO timestamp is reduced to its date part.
 */
export function parseCalendarDate(raw: string): IsoDate | null {
  const text = /^\d{4}-\d{2}-\d{2}T/.test(raw) ? raw.slice(0, 10) : raw.trim();
  const reference = new Date(2000, 0, 1);

  for (const pattern of DATE_FORMATS) {
    const parsed = parse(text, pattern, reference);
    if (isValid(parsed)) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }
  return null;
}

function parseClose(raw: unknown): number | null {
  const value = typeof raw === 'string' ? Number(raw.trim()) : raw;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    return null;
  }
  return value;
}

/**
 * Validate one row. Throws SeriesFormatError naming the source and row number.
 */
export function toPricePoint(row: unknown, source: string, rowNumber: number): PricePoint {
  if (!isRecord(row)) {
    throw new SeriesFormatError('expected an object with date and close fields', source, rowNumber);
  }

  const rawDate = readField(row, DATE_KEYS);
  if (typeof rawDate !== 'string') {
    throw new SeriesFormatError('missing date', source, rowNumber);
  }
  const date = parseCalendarDate(rawDate);
  if (date === null) {
    throw new SeriesFormatError(`invalid date "${rawDate}"`, source, rowNumber);
  }

  const rawClose = readField(row, CLOSE_KEYS);
  if (rawClose === undefined) {
    throw new SeriesFormatError('missing close price', source, rowNumber);
  }
  const closePrice = parseClose(rawClose);
  if (closePrice === null) {
    throw new SeriesFormatError(
      `close price must be a non-negative number, got ${JSON.stringify(rawClose)}`,
      source,
      rowNumber
    );
  }

  return { date, closePrice };
}
