/**
 * Series file loading
 *
 * Reads a price series from a JSON or CSV file on disk.
 * Rows are validated, de-duplicated by date (last row wins) and sorted ascending.
 */

import { existsSync, readFileSync } from 'fs';
import { extname, join } from 'path';
import Papa from 'papaparse';
import { mergeSeries } from '../engine/series';
import { SeriesFormatError } from '../errors';
import type { PricePoint } from '../types';
import { toPricePoint } from './parseRows';

/**
 * Get safe filename for symbol (replace special chars)
 */
export function getSeriesFileName(symbol: string): string {
  return `${symbol.toUpperCase().replace(/\./g, '_').replace(/[^A-Z0-9_-]/g, '_')}.json`;
}

/**
 * Default series file for a symbol inside a data directory
 */
export function getSeriesFilePath(dataDir: string, symbol: string): string {
  return join(dataDir, getSeriesFileName(symbol));
}

/**
 * Parse JSON text: an array of rows, or an object wrapping them under `prices` / `data`
 */
export function parseSeriesJson(text: string, source: string): PricePoint[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new SeriesFormatError(
      `invalid JSON (${error instanceof Error ? error.message : String(error)})`,
      source
    );
  }

  let rows: unknown = parsed;
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    rows = 'prices' in parsed ? parsed.prices : 'data' in parsed ? parsed.data : undefined;
  }

  if (!Array.isArray(rows)) {
    throw new SeriesFormatError('expected an array of price rows', source);
  }

  const points = rows.map((row: unknown, i) => toPricePoint(row, source, i + 1));
  return mergeSeries(points);
}

/**
 * Parse CSV text with a header row. Row numbers in errors count the header as row 1.
 */
export function parseSeriesCsv(text: string, source: string): PricePoint[] {
  const parsed = Papa.parse<Record<string, string>>(text.trim(), {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const firstError = parsed.errors[0];
  if (firstError) {
    const row = typeof firstError.row === 'number' ? firstError.row + 2 : undefined;
    throw new SeriesFormatError(`invalid CSV (${firstError.message})`, source, row);
  }

  const points = parsed.data.map((row, i) => toPricePoint(row, source, i + 2));
  return mergeSeries(points);
}

/**
 * Load one series file; the extension picks the parser (.csv, otherwise JSON)
 */
export function loadSeriesFile(filePath: string): PricePoint[] {
  if (!existsSync(filePath)) {
    throw new SeriesFormatError('file not found', filePath);
  }

  const content = readFileSync(filePath, 'utf-8');
  return extname(filePath).toLowerCase() === '.csv'
    ? parseSeriesCsv(content, filePath)
    : parseSeriesJson(content, filePath);
}

/**
 * Load and merge several files in order (later files win on duplicate dates)
 */
export function loadSeries(filePaths: readonly string[]): PricePoint[] {
  return mergeSeries(...filePaths.map((filePath) => loadSeriesFile(filePath)));
}
