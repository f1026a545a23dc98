#!/usr/bin/env node
/**
 * Runs one aggregation over the response file named in the params file.
 *
 * Usage: PARAMS_FILE=./params.json npm run aggregate
 *
 * Paths inside the params file are resolved against the params file's own
 * directory. Exits with code 1 when the run fails; nothing is written then.
 */

import path from 'node:path';

import { createConfig, parseEnv } from '../src/infra/config/env.js';
import { createLogger } from '../src/infra/logger/index.js';
import {
  createCsvExportWriter,
  loadResponseTable,
  loadRunParams,
  runAggregation,
  type AggregationRunError,
} from '../src/modules/aggregation/index.js';
import { createCrosswalkResolver, loadCrosswalks } from '../src/modules/geo/index.js';

const describeError = (error: AggregationRunError): Record<string, unknown> => ({
  type: error.type,
  ...('details' in error && error.details !== undefined && { details: error.details }),
  ...('level' in error && { level: error.level }),
  ...('fineKey' in error && { fineKey: error.fineKey }),
});

const main = async (): Promise<number> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ level: config.logger.level, pretty: config.logger.pretty });

  const paramsFile = path.resolve(process.cwd(), config.run.paramsFile);
  const baseDir = path.dirname(paramsFile);

  const params = await loadRunParams(paramsFile);
  if (params.isErr()) {
    logger.error(describeError(params.error), params.error.message);
    return 1;
  }
  const { config: runConfig, locations } = params.value;

  const tables = await loadCrosswalks(
    path.resolve(baseDir, locations.crosswalkDir),
    runConfig.geographyLevels
  );
  if (tables.isErr()) {
    logger.error(describeError(tables.error), tables.error.message);
    return 1;
  }

  const table = await loadResponseTable(path.resolve(baseDir, locations.inputFile));
  if (table.isErr()) {
    logger.error(describeError(table.error), table.error.message);
    return 1;
  }

  const result = await runAggregation(
    {
      resolver: createCrosswalkResolver(tables.value),
      writer: createCsvExportWriter({ exportDir: path.resolve(baseDir, locations.exportDir) }),
      logger,
    },
    { table: table.value, config: runConfig }
  );

  if (result.isErr()) {
    logger.error(describeError(result.error), result.error.message);
    return 1;
  }

  const { summary } = result.value;
  logger.info(
    {
      stage: summary.stage,
      units: summary.units.length,
      unmappedRows: summary.unmappedRows,
      rowsEmitted: summary.rowsEmitted,
      filesWritten: summary.filesWritten.length,
    },
    'Run summary'
  );
  return 0;
};

await main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
