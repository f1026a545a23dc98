import { describe, expect, it } from 'vitest';

import { DEFAULT_CONCURRENCY, parseRunParams } from '@/modules/aggregation/index.js';

const makeParams = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  start_date: '2020-06-01',
  end_date: '2020-06-07',
  backfill_days: 2,
  sample_size_threshold: 100,
  geography_levels: ['county', 'state'],
  export_dir: './receiving',
  input_file: './responses.csv',
  crosswalk_dir: './crosswalks',
  indicators: [
    {
      name: 'cli',
      kind: 'binary_percentage',
      signal_column: 'symptom_cli',
      weight_column: 'weight',
    },
  ],
  ...overrides,
});

describe('parseRunParams', () => {
  it('maps params onto a frozen config with defaults', () => {
    const { config, locations } = parseRunParams(makeParams())._unsafeUnwrap();

    expect(config).toEqual({
      startDate: '2020-06-01',
      endDate: '2020-06-07',
      backfillDays: 2,
      sampleSizeThreshold: 100,
      geographyLevels: ['county', 'state'],
      weekdayAdjustment: false,
      parallel: false,
      concurrency: DEFAULT_CONCURRENCY,
      unmappedPolicy: 'drop',
      indicators: [
        {
          name: 'cli',
          kind: 'binary_percentage',
          signalColumn: 'symptom_cli',
          weightColumn: 'weight',
          groupBy: ['day', 'geo'],
          smoothingWindowDays: 1,
          post: 'none',
        },
      ],
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(locations).toEqual({
      exportDir: './receiving',
      inputFile: './responses.csv',
      crosswalkDir: './crosswalks',
    });
  });

  it('reads multiselect indicators and optional switches', () => {
    const { config } = parseRunParams(
      makeParams({
        weekday_adjustment: true,
        parallel: true,
        concurrency: 8,
        unmapped_policy: 'abort',
        indicators: [
          {
            name: 'symptoms',
            kind: 'multiselect_percentage',
            choices: [{ label: 'fever', column: 'q_fever' }],
            composite_any: false,
            weight_column: 'weight',
            smoothing_window_days: 7,
            post: 'jeffreys',
          },
        ],
      })
    )._unsafeUnwrap();

    expect(config.weekdayAdjustment).toBe(true);
    expect(config.parallel).toBe(true);
    expect(config.concurrency).toBe(8);
    expect(config.unmappedPolicy).toBe('abort');
    expect(config.indicators).toEqual([
      {
        name: 'symptoms',
        kind: 'multiselect_percentage',
        choices: [{ label: 'fever', column: 'q_fever' }],
        compositeAny: false,
        weightColumn: 'weight',
        groupBy: ['day', 'geo'],
        smoothingWindowDays: 7,
        post: 'jeffreys',
      },
    ]);
  });

  it('rejects a start date after the end date', () => {
    const error = parseRunParams(
      makeParams({ start_date: '2020-06-08', end_date: '2020-06-07' })
    )._unsafeUnwrapErr();

    expect(error.type).toBe('ConfigurationError');
    expect(error.details).toEqual(['start_date 2020-06-08 is after end_date 2020-06-07']);
  });

  it('rejects malformed days', () => {
    const error = parseRunParams(makeParams({ end_date: '2020-02-30' }))._unsafeUnwrapErr();

    expect(error.details).toEqual(["/end_date: '2020-02-30' is not a YYYY-MM-DD day"]);
  });

  it('rejects unknown and repeated geography levels', () => {
    const error = parseRunParams(
      makeParams({ geography_levels: ['county', 'zip', 'county'] })
    )._unsafeUnwrapErr();

    expect(error.details).toEqual([
      "/geography_levels: unknown level 'zip'",
      "/geography_levels: 'county' listed twice",
    ]);
  });

  it('rejects a non-positive threshold through the schema', () => {
    const error = parseRunParams(makeParams({ sample_size_threshold: 0 }))._unsafeUnwrapErr();

    expect(error.message).toBe('Invalid run parameters');
    expect(error.details.some((detail) => detail.startsWith('/sample_size_threshold'))).toBe(true);
  });

  it('rejects params without required fields', () => {
    const params = makeParams();
    delete params['backfill_days'];

    const error = parseRunParams(params)._unsafeUnwrapErr();

    expect(error.details.some((detail) => detail.startsWith('/backfill_days'))).toBe(true);
  });

  it('rejects a value that is not an object', () => {
    expect(parseRunParams('nope')._unsafeUnwrapErr().type).toBe('ConfigurationError');
  });
});
