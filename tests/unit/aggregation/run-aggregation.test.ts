import { describe, expect, it } from 'vitest';

import { addDays, dayRange } from '@/common/types/day.js';
import { runAggregation, type ResponseRow, type RunConfig } from '@/modules/aggregation/index.js';

import {
  makeBinaryIndicator,
  makeMeanIndicator,
  makeResolver,
  makeRow,
  makeRunConfig,
  makeTable,
} from '../../fixtures/builders.js';
import {
  makeCapturingLogger,
  makeFailingWriter,
  makeInMemoryWriter,
  makeSilentLogger,
} from '../../fixtures/fakes.js';

const resolver = makeResolver({
  county: {
    '15213': { '42003': 1 },
    '15217': { '42003': 0.3, '42005': 0.7 },
    '19104': { '42101': 1 },
  },
  state: { '15213': { pa: 1 }, '15217': { pa: 1 }, '19104': { pa: 1 } },
});

const rows: ResponseRow[] = [
  makeRow({ respondentId: 'r1', geoKey: '15213', values: { cli: 1, weight: 1 } }),
  makeRow({ respondentId: 'r2', geoKey: '15213', values: { cli: 0, weight: 1 } }),
  makeRow({ respondentId: 'r3', geoKey: '15217', values: { cli: 1, weight: 2 } }),
  makeRow({ respondentId: 'r4', geoKey: '19104', values: { cli: 0, weight: 1 } }),
  makeRow({ respondentId: 'r5', geoKey: '99999', values: { cli: 1, weight: 1 } }),
];

const config = makeRunConfig({ geographyLevels: ['county', 'state'] });

const aggregate = (runConfig: RunConfig, tableRows: ResponseRow[] = rows) => {
  const writer = makeInMemoryWriter();
  const result = runAggregation(
    { resolver, writer, logger: makeSilentLogger() },
    { table: makeTable(tableRows), config: runConfig }
  );
  return { writer, result };
};

describe('runAggregation', () => {
  it('runs every stage and hands the export files to the writer', async () => {
    const { writer, result } = aggregate(config);

    const { rows: output, files, summary } = (await result)._unsafeUnwrap();

    expect(summary.stage).toBe('WRITTEN');
    // 42005 only receives 0.7 of r3, below the threshold of 1
    expect(output.map((row) => `${row.geoLevel}/${row.geoId}`)).toEqual([
      'county/42000',
      'county/42003',
      'county/42101',
      'state/pa',
    ]);
    expect(output[0]!.megacounty).toEqual(['42005']);
    expect(files.map((file) => [file.geoLevel, file.rows.length])).toEqual([
      ['county', 3],
      ['state', 1],
    ]);
    expect(writer.batches).toEqual([files]);
    expect(summary.filesWritten).toEqual([
      '2020-06-01_county_cli',
      '2020-06-01_state_cli',
    ]);
    expect(summary.rowsEmitted).toBe(4);
  });

  it('excludes an unmapped row from all output and counts it per level', async () => {
    const outOfRange = makeRow({ respondentId: 'r6', geoKey: '99999', day: '2020-05-01' });
    const { result } = aggregate(config, [...rows, outOfRange]);

    const { rows: output, summary } = (await result)._unsafeUnwrap();

    // r6 lies outside the run's days and is not counted
    expect(summary.unmappedRows).toEqual({ county: 1, state: 1 });
    // r1..r4 only: 1 + 1 + 1 + 1 shares at state level
    expect(output.find((row) => row.geoId === 'pa')!.sampleSize).toBe(4);
  });

  it('uses exactly the 7 days ending at each output day, even with a long backfill', async () => {
    const day = '2020-08-31';
    const indicator = makeBinaryIndicator({ smoothingWindowDays: 7 });
    const windowConfig = makeRunConfig({
      startDate: day,
      endDate: day,
      backfillDays: 60,
      indicators: [indicator],
    });
    const inside = new Set(dayRange(addDays(day, -6), day));
    const tableRows = dayRange(addDays(day, -70), addDays(day, 1)).map((d) =>
      makeRow({
        respondentId: d,
        geoKey: '15213',
        day: d,
        values: { cli: inside.has(d) ? 1 : 0, weight: 1 },
      })
    );

    const { rows: output } = (await aggregate(windowConfig, tableRows).result)._unsafeUnwrap();

    expect(output).toHaveLength(61);
    expect(output[0]!.day).toBe(addDays(day, -60));
    const last = output[output.length - 1]!;
    expect(last.day).toBe(day);
    expect(last.value).toBe(100);
    expect(last.sampleSize).toBe(7);
  });

  it('produces the same rows in parallel and sequential mode', async () => {
    const indicators = [makeBinaryIndicator(), makeMeanIndicator({ signalColumn: 'cli' })];
    const sequential = aggregate({ ...config, indicators, parallel: false });
    const parallel = aggregate({ ...config, indicators, parallel: true, concurrency: 3 });

    const a = (await sequential.result)._unsafeUnwrap();
    const b = (await parallel.result)._unsafeUnwrap();

    expect(b.rows).toEqual(a.rows);
    expect(b.summary.units.map((unit) => unit.unit)).toEqual(
      a.summary.units.map((unit) => unit.unit)
    );
  });

  it('adds weekday-adjusted signals when enabled', async () => {
    const { result } = aggregate({ ...config, weekdayAdjustment: true });

    const { files } = (await result)._unsafeUnwrap();

    expect(files.map((file) => `${file.geoLevel}/${file.signal}`)).toEqual([
      'county/cli',
      'county/cli_adj',
      'state/cli',
      'state/cli_adj',
    ]);
  });

  it('fails on invalid indicators before writing anything', async () => {
    const { writer, result } = aggregate({
      ...config,
      indicators: [makeBinaryIndicator({ signalColumn: 'tested' })],
    });

    const error = (await result)._unsafeUnwrapErr();

    expect(error.type).toBe('ConfigurationError');
    expect(writer.batches).toEqual([]);
  });

  it('fails when a requested level has no crosswalk', async () => {
    const { writer, result } = aggregate({ ...config, geographyLevels: ['county', 'hrr'] });

    const error = (await result)._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'CrosswalkLoadError',
      message: "No crosswalk loaded for level 'hrr'",
      level: 'hrr',
    });
    expect(writer.batches).toEqual([]);
  });

  it('aborts on an unmapped row under the abort policy', async () => {
    const { writer, result } = aggregate({ ...config, unmappedPolicy: 'abort' });

    const error = (await result)._unsafeUnwrapErr();

    expect(error.type).toBe('UnmappedGeographyError');
    expect(writer.batches).toEqual([]);
  });

  it('reports a failing writer', async () => {
    const result = await runAggregation(
      { resolver, writer: makeFailingWriter('disk full'), logger: makeSilentLogger() },
      { table: makeTable(rows), config }
    );

    expect(result._unsafeUnwrapErr()).toEqual({ type: 'OutputWriteError', message: 'disk full' });
  });

  it('logs stage transitions and dropped rows', async () => {
    const { logger, lines } = makeCapturingLogger();

    await runAggregation(
      { resolver, writer: makeInMemoryWriter(), logger },
      { table: makeTable(rows), config }
    );

    const transitions = lines
      .filter((line) => line.msg === 'Run stage changed')
      .map((line) => line['to']);
    expect(transitions).toEqual(['RESOLVED', 'COMPUTED', 'MERGED', 'POSTPROCESSED', 'WRITTEN']);
    expect(lines.filter((line) => line.msg === 'Dropped unmapped rows')).toHaveLength(2);
  });

  it('logs skipped groups per unit and day', async () => {
    const { logger, lines } = makeCapturingLogger();

    await runAggregation(
      { resolver, writer: makeInMemoryWriter(), logger },
      { table: makeTable(rows), config: { ...config, endDate: '2020-06-02' } }
    );

    const skipped = lines
      .filter((line) => line.msg === 'Skipped groups without data')
      .map((line) => [line['unit'], line['byDay']]);
    expect(skipped).toEqual([
      ['cli:county', { '2020-06-02': 3 }],
      ['cli:state', { '2020-06-02': 1 }],
    ]);
  });
});
