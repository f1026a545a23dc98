import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { loadResponseTable } from '@/modules/aggregation/index.js';

const writeResponses = async (contents: string): Promise<string> => {
  const dir = await mkdtemp(path.join(tmpdir(), 'responses-'));
  const filePath = path.join(dir, 'responses.csv');
  await writeFile(filePath, contents, 'utf8');
  return filePath;
};

describe('loadResponseTable', () => {
  it('reads id columns as strings and the rest as numbers', async () => {
    const filePath = await writeResponses(
      'respondent_id,zip,day,cli,weight\nr1,02139,2020-06-01,1,0.5\nr2,15213,2020-06-02,0,2\n'
    );

    const table = (await loadResponseTable(filePath))._unsafeUnwrap();

    expect(table.columns).toEqual(['cli', 'weight']);
    expect(table.rows).toEqual([
      { respondentId: 'r1', geoKey: '02139', day: '2020-06-01', values: { cli: 1, weight: 0.5 } },
      { respondentId: 'r2', geoKey: '15213', day: '2020-06-02', values: { cli: 0, weight: 2 } },
    ]);
  });

  it('reads blank and NA cells as missing', async () => {
    const filePath = await writeResponses(
      'respondent_id,zip,day,cli,weight\nr1,15213,2020-06-01,NA,1\nr2,15213,2020-06-01,,1\n'
    );

    const table = (await loadResponseTable(filePath))._unsafeUnwrap();

    expect(table.rows.map((row) => row.values['cli'])).toEqual([null, null]);
  });

  it('freezes the loaded rows', async () => {
    const filePath = await writeResponses('respondent_id,zip,day,cli\nr1,15213,2020-06-01,1\n');

    const table = (await loadResponseTable(filePath))._unsafeUnwrap();

    expect(Object.isFrozen(table.rows)).toBe(true);
    expect(Object.isFrozen(table.rows[0])).toBe(true);
    expect(Object.isFrozen(table.rows[0]!.values)).toBe(true);
  });

  it('fails when an id column is missing', async () => {
    const filePath = await writeResponses('respondent_id,day,cli\nr1,2020-06-01,1\n');

    const error = (await loadResponseTable(filePath))._unsafeUnwrapErr();

    expect(error.type).toBe('ResponseLoadError');
    expect(error.message).toBe(`Response file ${filePath} is missing required columns: zip`);
  });

  it('lists malformed days and non-numeric cells', async () => {
    const filePath = await writeResponses(
      'respondent_id,zip,day,cli\nr1,15213,06/01/2020,1\nr2,15213,2020-06-01,yes\nr3,15213,2020-06-01,1\n'
    );

    const error = (await loadResponseTable(filePath))._unsafeUnwrapErr();

    expect(error.message).toBe(`Malformed response file ${filePath}`);
    expect(error.details).toEqual([
      "line 2: day '06/01/2020' is not a YYYY-MM-DD day",
      "line 3: cli 'yes' is not a number",
    ]);
  });

  it('fails when the file does not exist', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'responses-'));
    const filePath = path.join(dir, 'missing.csv');

    const error = (await loadResponseTable(filePath))._unsafeUnwrapErr();

    expect(error.message).toBe(`Response file not found at ${filePath}`);
  });
});
