/**
 * Run parameters.
 *
 * The params file uses snake_case keys; they are validated with TypeBox and
 * mapped to the frozen camelCase `RunConfig` the engine works with.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import { isIsoDay } from '@/common/types/day.js';
import { isGeoLevel, type GeoLevel } from '@/modules/geo/index.js';

import { createConfigurationError, type ConfigurationError } from './errors.js';

import type { IndicatorDefinition, RunConfig, RunLocations } from './types.js';

export const DEFAULT_CONCURRENCY = 4;

const GroupBySchema = Type.Array(Type.Union([Type.Literal('day'), Type.Literal('geo')]));

const PostSchema = Type.Union([Type.Literal('none'), Type.Literal('jeffreys')]);

const IndicatorCommon = {
  name: Type.String({ minLength: 1, pattern: '^[a-z0-9_]+$' }),
  weight_column: Type.String({ minLength: 1 }),
  group_by: Type.Optional(GroupBySchema),
  smoothing_window_days: Type.Optional(Type.Integer({ minimum: 1 })),
  post: Type.Optional(PostSchema),
};

export const IndicatorParamsSchema = Type.Union([
  Type.Object({
    ...IndicatorCommon,
    kind: Type.Union([Type.Literal('mean'), Type.Literal('binary_percentage')]),
    signal_column: Type.String({ minLength: 1 }),
  }),
  Type.Object({
    ...IndicatorCommon,
    kind: Type.Literal('multiselect_percentage'),
    choices: Type.Array(
      Type.Object({
        label: Type.String({ minLength: 1, pattern: '^[a-z0-9_]+$' }),
        column: Type.String({ minLength: 1 }),
      }),
      { minItems: 1 }
    ),
    composite_any: Type.Optional(Type.Boolean()),
  }),
]);

export const RunParamsSchema = Type.Object({
  start_date: Type.String(),
  end_date: Type.String(),
  backfill_days: Type.Integer({ minimum: 0 }),
  sample_size_threshold: Type.Number({ exclusiveMinimum: 0 }),
  geography_levels: Type.Array(Type.String(), { minItems: 1 }),
  weekday_adjustment: Type.Optional(Type.Boolean()),
  parallel: Type.Optional(Type.Boolean()),
  concurrency: Type.Optional(Type.Integer({ minimum: 1 })),
  unmapped_policy: Type.Optional(Type.Union([Type.Literal('drop'), Type.Literal('abort')])),
  export_dir: Type.String({ minLength: 1 }),
  input_file: Type.String({ minLength: 1 }),
  crosswalk_dir: Type.String({ minLength: 1 }),
  indicators: Type.Array(IndicatorParamsSchema, { minItems: 1 }),
});

export type IndicatorParams = Static<typeof IndicatorParamsSchema>;
export type RunParams = Static<typeof RunParamsSchema>;

/**
 * Maps one indicator entry onto its definition, filling defaults.
 */
export function toIndicatorDefinition(params: IndicatorParams): IndicatorDefinition {
  const common: Pick<
    IndicatorDefinition,
    'name' | 'weightColumn' | 'groupBy' | 'smoothingWindowDays' | 'post'
  > = {
    name: params.name,
    weightColumn: params.weight_column,
    groupBy: params.group_by ?? ['day', 'geo'],
    smoothingWindowDays: params.smoothing_window_days ?? 1,
    post: params.post ?? 'none',
  };

  if (params.kind === 'multiselect_percentage') {
    return {
      ...common,
      kind: params.kind,
      choices: params.choices.map((choice) => ({ label: choice.label, column: choice.column })),
      compositeAny: params.composite_any ?? true,
    };
  }

  return { ...common, kind: params.kind, signalColumn: params.signal_column };
}

/**
 * Validates raw params and produces the engine configuration plus the paths
 * the shell needs.
 */
export function parseRunParams(
  raw: unknown
): Result<{ config: RunConfig; locations: RunLocations }, ConfigurationError> {
  if (!Value.Check(RunParamsSchema, raw)) {
    const details = [...Value.Errors(RunParamsSchema, raw)].map(
      (e) => `${e.path}: ${e.message}`
    );
    return err(createConfigurationError('Invalid run parameters', details));
  }

  const problems: string[] = [];

  for (const key of ['start_date', 'end_date'] as const) {
    if (!isIsoDay(raw[key])) {
      problems.push(`/${key}: '${raw[key]}' is not a YYYY-MM-DD day`);
    }
  }
  if (problems.length === 0 && raw.start_date > raw.end_date) {
    problems.push(`start_date ${raw.start_date} is after end_date ${raw.end_date}`);
  }

  const levels: GeoLevel[] = [];
  for (const level of raw.geography_levels) {
    if (!isGeoLevel(level)) {
      problems.push(`/geography_levels: unknown level '${level}'`);
    } else if (levels.includes(level)) {
      problems.push(`/geography_levels: '${level}' listed twice`);
    } else {
      levels.push(level);
    }
  }

  if (problems.length > 0) {
    return err(createConfigurationError('Invalid run parameters', problems));
  }

  const config: RunConfig = Object.freeze({
    startDate: raw.start_date,
    endDate: raw.end_date,
    backfillDays: raw.backfill_days,
    sampleSizeThreshold: raw.sample_size_threshold,
    geographyLevels: Object.freeze(levels),
    weekdayAdjustment: raw.weekday_adjustment ?? false,
    parallel: raw.parallel ?? false,
    concurrency: raw.concurrency ?? DEFAULT_CONCURRENCY,
    unmappedPolicy: raw.unmapped_policy ?? 'drop',
    indicators: Object.freeze(raw.indicators.map(toIndicatorDefinition)),
  });

  return ok({
    config,
    locations: {
      exportDir: raw.export_dir,
      inputFile: raw.input_file,
      crosswalkDir: raw.crosswalk_dir,
    },
  });
}
