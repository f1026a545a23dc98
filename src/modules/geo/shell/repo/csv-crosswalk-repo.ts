import fs from 'node:fs/promises';
import path from 'node:path';

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { parse as parseCsv } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import { toErrorMessage } from '@/common/types/errors.js';

import { createCrosswalkTable } from '../../core/crosswalk.js';
import { createCrosswalkLoadError, type CrosswalkLoadError } from '../../core/errors.js';

import type { CrosswalkEntry, CrosswalkTable, GeoLevel } from '../../core/types.js';

const REQUIRED_COLUMNS = ['zip', 'geo_id', 'weight'] as const;

const CsvRowsSchema = Type.Array(Type.Array(Type.String()));
const csvRowsValidator = TypeCompiler.Compile(CsvRowsSchema);

/**
 * File name of the crosswalk for a level inside the crosswalk directory.
 */
export const crosswalkFileName = (level: GeoLevel): string => `zip_${level}_table.csv`;

/**
 * Loads one crosswalk CSV (`zip,geo_id,weight`).
 *
 * Keys are read as strings so leading zeros survive.
 */
export async function loadCrosswalkTable(
  filePath: string,
  level: GeoLevel
): Promise<Result<CrosswalkTable, CrosswalkLoadError>> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err(createCrosswalkLoadError(level, `Crosswalk file not found at ${filePath}`));
    }
    return err(
      createCrosswalkLoadError(
        level,
        `Failed to read crosswalk at ${filePath}: ${toErrorMessage(error)}`
      )
    );
  }

  let parsed: unknown;
  try {
    parsed = parseCsv(contents, { skip_empty_lines: true, trim: true });
  } catch (error) {
    return err(
      createCrosswalkLoadError(
        level,
        `Failed to parse crosswalk CSV at ${filePath}: ${toErrorMessage(error)}`
      )
    );
  }

  if (!csvRowsValidator.Check(parsed)) {
    return err(createCrosswalkLoadError(level, `Unexpected CSV structure in ${filePath}`));
  }

  const [header, ...records] = parsed;
  if (header === undefined) {
    return err(createCrosswalkLoadError(level, `Crosswalk ${filePath} is empty`));
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    return err(
      createCrosswalkLoadError(
        level,
        `Crosswalk ${filePath} is missing required columns: ${missing.join(', ')}`
      )
    );
  }

  const zipIndex = header.indexOf('zip');
  const geoIndex = header.indexOf('geo_id');
  const weightIndex = header.indexOf('weight');

  const entries: CrosswalkEntry[] = [];
  const problems: string[] = [];

  records.forEach((record, index) => {
    const rawWeight = record[weightIndex] ?? '';
    const weight = rawWeight === '' ? Number.NaN : Number(rawWeight);
    if (Number.isNaN(weight)) {
      problems.push(`line ${String(index + 2)}: weight '${rawWeight}' is not a number`);
      return;
    }
    entries.push({
      fineKey: record[zipIndex] ?? '',
      geoId: record[geoIndex] ?? '',
      weight,
    });
  });

  if (problems.length > 0) {
    return err(createCrosswalkLoadError(level, `Malformed crosswalk ${filePath}`, problems));
  }

  return createCrosswalkTable(level, entries);
}

/**
 * Loads `zip_<level>_table.csv` for every requested level.
 * Stops at the first failing table.
 */
export async function loadCrosswalks(
  rootDir: string,
  levels: readonly GeoLevel[]
): Promise<Result<CrosswalkTable[], CrosswalkLoadError>> {
  const tables: CrosswalkTable[] = [];

  for (const level of levels) {
    const result = await loadCrosswalkTable(path.join(rootDir, crosswalkFileName(level)), level);
    if (result.isErr()) {
      return err(result.error);
    }
    tables.push(result.value);
  }

  return ok(tables);
}
