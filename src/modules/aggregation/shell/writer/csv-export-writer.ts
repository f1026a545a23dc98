/**
 * CSV Export Writer
 *
 * Writes one file per (day, geography level, signal) into the export
 * directory. Every file of a run is first written to a staging directory
 * inside the export directory and only moved into place once all of them
 * exist. Files being replaced are set aside first; if any move fails, the
 * files already moved are taken back out and the set-aside ones restored,
 * so the export directory ends up as it was before the batch.
 */

import path from 'node:path';

import fse from 'fs-extra';
import { err, ok, type Result } from 'neverthrow';

import { toCompactDay } from '@/common/types/day.js';
import { toErrorMessage } from '@/common/types/errors.js';

import { createOutputWriteError, type OutputWriteError } from '../../core/errors.js';
import { UNDEFINED_SE, type AggregateRow, type ExportFile } from '../../core/types.js';

import type { OutputWriter } from '../../core/ports.js';

export const EXPORT_HEADER = [
  'geo_id',
  'val',
  'se',
  'sample_size',
  'effective_sample_size',
  'missing_val',
  'missing_se',
  'missing_sample_size',
] as const;

/**
 * Written in place of a standard error that cannot be computed.
 */
export const NA = 'NA';

const STAGING_PREFIX = '.staging-';
const BACKUP_DIR = 'replaced';

export interface CsvExportWriterOptions {
  exportDir: string;
}

/**
 * `20200601_county_cli.csv`
 */
export const exportFileName = (file: Pick<ExportFile, 'day' | 'geoLevel' | 'signal'>): string =>
  `${toCompactDay(file.day)}_${file.geoLevel}_${file.signal}.csv`;

const formatRow = (row: AggregateRow): string =>
  [
    row.geoId,
    String(row.value),
    row.standardError === UNDEFINED_SE ? NA : String(row.standardError),
    String(row.sampleSize),
    String(row.effectiveSampleSize),
    String(row.missingValue),
    String(row.missingStandardError),
    String(row.missingSampleSize),
  ].join(',');

export const formatExportFile = (file: ExportFile): string =>
  [EXPORT_HEADER.join(','), ...file.rows.map(formatRow)].join('\n') + '\n';

interface Publication {
  /** Destinations that now hold a file of this batch */
  readonly moved: string[];
  /** Names whose previous file was set aside in the backup directory */
  readonly backedUp: string[];
}

/**
 * Puts every file of the batch back the way it was: new files are removed
 * and replaced files are restored from their backups.
 */
const rollBack = async (
  exportDir: string,
  backupDir: string,
  publication: Publication
): Promise<void> => {
  for (const destination of publication.moved) {
    await fse.remove(destination);
  }
  for (const name of publication.backedUp) {
    await fse.move(path.join(backupDir, name), path.join(exportDir, name));
  }
};

export const createCsvExportWriter = (options: CsvExportWriterOptions): OutputWriter => {
  const { exportDir } = options;

  const publish = async (
    stagingDir: string,
    files: readonly ExportFile[]
  ): Promise<Result<string[], OutputWriteError>> => {
    const names: string[] = [];
    try {
      for (const file of files) {
        const name = exportFileName(file);
        await fse.writeFile(path.join(stagingDir, name), formatExportFile(file), 'utf8');
        names.push(name);
      }
    } catch (error) {
      return err(
        createOutputWriteError(
          `Failed to write export files to ${exportDir}: ${toErrorMessage(error)}`,
          error
        )
      );
    }

    // Staging lives on the same filesystem, so each move is a rename
    const backupDir = path.join(stagingDir, BACKUP_DIR);
    const publication: Publication = { moved: [], backedUp: [] };
    try {
      await fse.ensureDir(backupDir);
      for (const name of names) {
        const destination = path.join(exportDir, name);
        if (await fse.pathExists(destination)) {
          await fse.move(destination, path.join(backupDir, name));
          publication.backedUp.push(name);
        }
        await fse.move(path.join(stagingDir, name), destination);
        publication.moved.push(destination);
      }
      return ok(publication.moved);
    } catch (error) {
      const message = `Failed to move export files into ${exportDir}: ${toErrorMessage(error)}`;
      try {
        await rollBack(exportDir, backupDir, publication);
      } catch (rollbackError) {
        const detail = `restoring the previous files also failed: ${toErrorMessage(rollbackError)}`;
        return err(createOutputWriteError(`${message}; ${detail}`, rollbackError));
      }
      return err(createOutputWriteError(message, error));
    }
  };

  return {
    async write(files): Promise<Result<string[], OutputWriteError>> {
      let stagingDir: string;
      try {
        await fse.ensureDir(exportDir);
        stagingDir = await fse.mkdtemp(path.join(exportDir, STAGING_PREFIX));
      } catch (error) {
        return err(
          createOutputWriteError(
            `Failed to prepare export directory ${exportDir}: ${toErrorMessage(error)}`,
            error
          )
        );
      }

      const result = await publish(stagingDir, files);
      await fse.remove(stagingDir);
      return result;
    },
  };
};
