import fs from 'fs';
import { stringify } from 'csv-stringify/sync';
import { Place } from '../schemas/place';
import { ScraperConfig, csvPath, logPath, partialCsvPath, partialLogPath } from '../schemas/config';

export const CSV_COLUMNS = ['Name', 'Rating', 'Categories'];

// integral ratings keep one decimal place: 9 -> "9.0"
export function formatRating(rating: number | null): string {
  if (rating === null) return '';
  return Number.isInteger(rating) ? rating.toFixed(1) : String(rating);
}

export function ensureOutDir(dir: string): string {
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  return dir;
}

/** Rewrites the whole file; the BOM keeps spreadsheet apps reading it as UTF-8. */
export function exportCSV(file: string, places: readonly Place[]): string {
  const records = places.map(p => [
    p.name,
    formatRating(p.rating),
    p.categories.join(' | '),
  ]);
  const csv = stringify(records, { header: true, columns: CSV_COLUMNS, bom: true });
  fs.writeFileSync(file, csv, 'utf-8');
  return file;
}

export function exportLog(file: string, lines: readonly string[]): string {
  fs.writeFileSync(file, lines.join('\n'), 'utf-8');
  return file;
}

export type SavedFiles = { csv: string; log: string };

export function savePartial(config: ScraperConfig, page: number, places: readonly Place[], lines: readonly string[]): SavedFiles {
  return {
    csv: exportCSV(partialCsvPath(config, page), places),
    log: exportLog(partialLogPath(config, page), lines),
  };
}

export function saveFinal(config: ScraperConfig, places: readonly Place[], lines: readonly string[]): SavedFiles {
  return {
    csv: exportCSV(csvPath(config), places),
    log: exportLog(logPath(config), lines),
  };
}
