/**
 * CSV export of the latest-per-symbol view, as the dashboard downloads it.
 */

import { stringify } from 'csv-stringify/sync';
import { CSV_COLUMNS, type ObservationView } from '../contracts/observation.types.js';
import { exitPrice } from './observation.validator.js';

type CsvRow = Record<(typeof CSV_COLUMNS)[number], string>;

const pad = (n: number) => String(n).padStart(2, '0');

/** `YYYY-MM-DD HH:mm:ss` in UTC */
export function formatTimestamp(iso: string): string {
  const d = new Date(iso);
  return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} `
    + `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
}

export function exportFilename(now: Date): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `investment_data_${date}_${time}.csv`;
}

export function toCsv(rows: ObservationView[]): string {
  const records: CsvRow[] = rows.map(row => ({
    symbol: row.symbol,
    price: row.price.toFixed(2),
    atr: row.atr.toFixed(2),
    exit_price: exitPrice(row).toFixed(2),
    timestamp: formatTimestamp(row.timestamp),
  }));

  return stringify(records, { header: true, columns: [...CSV_COLUMNS] });
}
