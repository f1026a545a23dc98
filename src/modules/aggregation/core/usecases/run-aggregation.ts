/**
 * Run Aggregation Use Case
 *
 * Orchestrates a whole run: validates indicators, resolves geographies once
 * per level, then takes every (signal, level, variant) unit through compute,
 * merge and postprocess before handing the export files to the writer.
 *
 * The run moves LOADED -> RESOLVED -> COMPUTED -> MERGED -> POSTPROCESSED ->
 * WRITTEN and never back. Any fatal error stops the run before the writer is
 * called, so a failed run leaves the export directory untouched.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createCrosswalkLoadError,
  type CrosswalkResolver,
  type GeoLevel,
} from '@/modules/geo/index.js';
import { mapUnits } from '@/utils/concurrency.js';

import { groupExportFiles, sortRows } from '../export-files.js';
import { validateIndicators } from '../indicators.js';
import { createRunStateMachine, type RunStage } from '../run-state.js';
import { runInputSpan } from '../smoothing.js';

import {
  computeUnit,
  mergeUnit,
  planUnits,
  postprocessUnit,
  type UnitDiagnostics,
} from './aggregate-unit.js';
import { resolveGeographies, type ResolvedLevel } from './resolve-geographies.js';

import type { AggregationRunError } from '../errors.js';
import type { OutputWriter } from '../ports.js';
import type { AggregateRow, ExportFile, IsoDay, ResponseTable, RunConfig } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RunAggregationDeps {
  resolver: CrosswalkResolver;
  writer: OutputWriter;
  logger: Logger;
}

export interface RunAggregationInput {
  table: ResponseTable;
  config: RunConfig;
}

/**
 * Totals reported at the end of a run.
 */
export interface RunSummary {
  readonly stage: RunStage;
  readonly units: readonly UnitDiagnostics[];
  /** Rows without a crosswalk entry, per level */
  readonly unmappedRows: Readonly<Partial<Record<GeoLevel, number>>>;
  readonly rowsEmitted: number;
  readonly filesWritten: readonly string[];
}

export interface RunAggregationResult {
  readonly rows: readonly AggregateRow[];
  readonly files: readonly ExportFile[];
  readonly summary: RunSummary;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

const earliestDay = (table: ResponseTable): IsoDay | undefined => {
  let first: IsoDay | undefined;
  for (const row of table.rows) {
    if (first === undefined || row.day < first) {
      first = row.day;
    }
  }
  return first;
};

export const runAggregation = async (
  deps: RunAggregationDeps,
  input: RunAggregationInput
): Promise<Result<RunAggregationResult, AggregationRunError>> => {
  const { resolver, writer, logger } = deps;
  const { table, config } = input;

  const log = logger.child({ usecase: 'runAggregation' });
  const machine = createRunStateMachine((from, to) => {
    log.info({ from, to }, 'Run stage changed');
  });

  // Fail fast on configuration before touching any data
  const signals = validateIndicators(config.indicators, table.columns);
  if (signals.isErr()) {
    log.error({ details: signals.error.details }, signals.error.message);
    return err(signals.error);
  }

  const available = new Set(resolver.levels());
  const missingLevels = config.geographyLevels.filter((level) => !available.has(level));
  const firstMissing = missingLevels[0];
  if (firstMissing !== undefined) {
    return err(
      createCrosswalkLoadError(firstMissing, `No crosswalk loaded for level '${firstMissing}'`)
    );
  }

  log.info(
    {
      rows: table.rows.length,
      signals: signals.value.length,
      levels: config.geographyLevels,
      startDate: config.startDate,
      endDate: config.endDate,
    },
    'Starting aggregation run'
  );

  // RESOLVED
  const resolved = resolveGeographies(
    table,
    resolver,
    config.geographyLevels,
    config.unmappedPolicy,
    runInputSpan(config)
  );
  if (resolved.isErr()) {
    log.error(
      { fineKey: resolved.error.fineKey, level: resolved.error.level },
      resolved.error.message
    );
    return err(resolved.error);
  }

  const byLevel = new Map<GeoLevel, ResolvedLevel>(
    resolved.value.map((level) => [level.level, level])
  );
  const unmappedRows: Partial<Record<GeoLevel, number>> = {};
  for (const level of resolved.value) {
    unmappedRows[level.level] = level.unmappedRows;
    if (level.unmappedRows > 0) {
      log.warn({ level: level.level, unmappedRows: level.unmappedRows }, 'Dropped unmapped rows');
    }
  }

  const toResolved = machine.advance('RESOLVED');
  if (toResolved.isErr()) return err(toResolved.error);

  // COMPUTED
  const units = planUnits(signals.value, config.geographyLevels, config.weekdayAdjustment);
  const firstAvailableDay = earliestDay(table);
  const options = { parallel: config.parallel, concurrency: config.concurrency };

  const computations = await mapUnits(units, options, async (unit) => {
    const level = byLevel.get(unit.level) ?? { level: unit.level, rows: [], unmappedRows: 0 };
    return computeUnit(unit, level, config, firstAvailableDay);
  });

  const toComputed = machine.advance('COMPUTED');
  if (toComputed.isErr()) return err(toComputed.error);

  // MERGED
  const merges = await mapUnits(computations, options, async (computation) =>
    mergeUnit(computation, config)
  );

  const toMerged = machine.advance('MERGED');
  if (toMerged.isErr()) return err(toMerged.error);

  // POSTPROCESSED
  const outputs = await mapUnits(merges, options, async (merge) => postprocessUnit(merge));

  const toPostprocessed = machine.advance('POSTPROCESSED');
  if (toPostprocessed.isErr()) return err(toPostprocessed.error);

  const diagnostics = outputs.map((output) => output.diagnostics);
  for (const output of outputs) {
    log.debug({ ...output.diagnostics }, 'Unit finished');
    if (output.diagnostics.insufficientGroups > 0) {
      log.debug(
        { unit: output.unit.key, byDay: output.diagnostics.insufficientGroupsByDay },
        'Skipped groups without data'
      );
    }
    if (output.warnings.length > 0) {
      log.warn(
        {
          unit: output.unit.key,
          count: output.warnings.length,
          byDay: output.diagnostics.undefinedStandardErrorsByDay,
          sampleSizes: output.warnings.map((warning) => warning.sampleSize),
        },
        'Rows emitted with undefined standard error'
      );
    }
  }

  const rows = sortRows(outputs.flatMap((output) => output.rows));
  const files = groupExportFiles(rows);

  // WRITTEN
  const written = await writer.write(files);
  if (written.isErr()) {
    log.error({ err: written.error.cause }, written.error.message);
    return err(written.error);
  }

  const toWritten = machine.advance('WRITTEN');
  if (toWritten.isErr()) return err(toWritten.error);

  const summary: RunSummary = {
    stage: machine.current(),
    units: diagnostics,
    unmappedRows,
    rowsEmitted: rows.length,
    filesWritten: written.value,
  };

  log.info(
    { rowsEmitted: summary.rowsEmitted, filesWritten: summary.filesWritten.length },
    'Aggregation run complete'
  );

  return ok({ rows, files, summary });
};
