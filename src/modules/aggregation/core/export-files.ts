import type { AggregateRow, ExportFile } from './types.js';

const compare = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Orders rows by signal, level, day and geo id.
 */
export function sortRows(rows: readonly AggregateRow[]): AggregateRow[] {
  return [...rows].sort(
    (a, b) =>
      compare(a.signal, b.signal) ||
      compare(a.geoLevel, b.geoLevel) ||
      compare(a.day, b.day) ||
      compare(a.geoId, b.geoId)
  );
}

/**
 * Splits rows into one export file per (day, geography level, signal).
 * Files come out in a fixed order and their rows sorted by geo id.
 */
export function groupExportFiles(rows: readonly AggregateRow[]): ExportFile[] {
  const files = new Map<string, { file: Omit<ExportFile, 'rows'>; rows: AggregateRow[] }>();

  for (const row of sortRows(rows)) {
    const key = `${row.day}|${row.geoLevel}|${row.signal}`;
    const entry = files.get(key);
    if (entry === undefined) {
      files.set(key, {
        file: { day: row.day, geoLevel: row.geoLevel, signal: row.signal },
        rows: [row],
      });
    } else {
      entry.rows.push(row);
    }
  }

  return [...files.keys()]
    .sort(compare)
    .flatMap((key) => {
      const entry = files.get(key);
      return entry === undefined ? [] : [{ ...entry.file, rows: entry.rows }];
    });
}
