import fs from 'node:fs/promises';

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { parse as parseCsv } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import { isIsoDay } from '@/common/types/day.js';
import { toErrorMessage } from '@/common/types/errors.js';

import { createResponseLoadError, type ResponseLoadError } from '../../core/errors.js';

import type { ResponseRow, ResponseTable } from '../../core/types.js';

const ID_COLUMNS = ['respondent_id', 'zip', 'day'] as const;
const ID_COLUMN_SET: ReadonlySet<string> = new Set(ID_COLUMNS);

/**
 * Cell values read as a missing answer.
 */
export const MISSING_MARKERS: readonly string[] = ['', 'NA'];

const CsvRowsSchema = Type.Array(Type.Array(Type.String()));
const csvRowsValidator = TypeCompiler.Compile(CsvRowsSchema);

/**
 * Loads the response table.
 *
 * `respondent_id`, `zip` and `day` are kept as strings; every other column
 * must be numeric, with blank or `NA` cells read as missing. Rows are frozen
 * once loaded.
 */
export async function loadResponseTable(
  filePath: string
): Promise<Result<ResponseTable, ResponseLoadError>> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err(createResponseLoadError(`Response file not found at ${filePath}`));
    }
    return err(
      createResponseLoadError(`Failed to read responses at ${filePath}: ${toErrorMessage(error)}`)
    );
  }

  let parsed: unknown;
  try {
    parsed = parseCsv(contents, { skip_empty_lines: true, trim: true });
  } catch (error) {
    return err(
      createResponseLoadError(
        `Failed to parse response CSV at ${filePath}: ${toErrorMessage(error)}`
      )
    );
  }

  if (!csvRowsValidator.Check(parsed)) {
    return err(createResponseLoadError(`Unexpected CSV structure in ${filePath}`));
  }

  const [header, ...records] = parsed;
  if (header === undefined) {
    return err(createResponseLoadError(`Response file ${filePath} is empty`));
  }

  const missing = ID_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    return err(
      createResponseLoadError(
        `Response file ${filePath} is missing required columns: ${missing.join(', ')}`
      )
    );
  }

  const idIndex = header.indexOf('respondent_id');
  const zipIndex = header.indexOf('zip');
  const dayIndex = header.indexOf('day');
  const numeric = header
    .map((column, index) => ({ column, index }))
    .filter(({ column }) => !ID_COLUMN_SET.has(column));

  const rows: ResponseRow[] = [];
  const problems: string[] = [];

  records.forEach((record, index) => {
    const line = String(index + 2);
    const day = record[dayIndex] ?? '';
    if (!isIsoDay(day)) {
      problems.push(`line ${line}: day '${day}' is not a YYYY-MM-DD day`);
      return;
    }

    const values: Record<string, number | null> = {};
    for (const { column, index: cell } of numeric) {
      const raw = record[cell] ?? '';
      if (MISSING_MARKERS.includes(raw)) {
        values[column] = null;
        continue;
      }
      const value = Number(raw);
      if (!Number.isFinite(value)) {
        problems.push(`line ${line}: ${column} '${raw}' is not a number`);
        return;
      }
      values[column] = value;
    }

    rows.push(
      Object.freeze({
        respondentId: record[idIndex] ?? '',
        geoKey: record[zipIndex] ?? '',
        day,
        values: Object.freeze(values),
      })
    );
  });

  if (problems.length > 0) {
    return err(createResponseLoadError(`Malformed response file ${filePath}`, problems));
  }

  return ok({
    columns: Object.freeze(numeric.map(({ column }) => column)),
    rows: Object.freeze(rows),
  });
}
