import { describe, expect, it } from 'vitest';

import { adjustForWeekday } from '@/modules/aggregation/index.js';

import { makeResponse } from '../../fixtures/builders.js';

// 2020-06-05 is a Friday, 2020-06-06 a Saturday
const FRIDAY = '2020-06-05';
const SATURDAY = '2020-06-06';

describe('adjustForWeekday', () => {
  it('gives weekdays 5/7 and weekends 2/7 of the total weight', () => {
    const adjusted = adjustForWeekday([
      makeResponse(1, 1, FRIDAY),
      makeResponse(0, 1, SATURDAY),
      makeResponse(0, 1, SATURDAY),
      makeResponse(1, 1, SATURDAY),
    ]);

    const weekday = adjusted
      .filter((response) => response.day === FRIDAY)
      .reduce((sum, response) => sum + response.weight, 0);
    const weekend = adjusted
      .filter((response) => response.day === SATURDAY)
      .reduce((sum, response) => sum + response.weight, 0);

    expect(weekday).toBeCloseTo((4 * 5) / 7, 10);
    expect(weekend).toBeCloseTo((4 * 2) / 7, 10);
  });

  it('keeps values, days and shares', () => {
    const adjusted = adjustForWeekday([
      makeResponse(1, 2, FRIDAY, 0.5),
      makeResponse(0, 2, SATURDAY, 1),
    ]);

    expect(adjusted.map(({ value, day, share }) => ({ value, day, share }))).toEqual([
      { value: 1, day: FRIDAY, share: 0.5 },
      { value: 0, day: SATURDAY, share: 1 },
    ]);
  });

  it('leaves a group with only weekday responses as it is', () => {
    const responses = [makeResponse(1, 1, FRIDAY), makeResponse(0, 3, '2020-06-04')];

    expect(adjustForWeekday(responses)).toBe(responses);
  });

  it('leaves a group with only weekend responses as it is', () => {
    const responses = [makeResponse(1, 1, SATURDAY), makeResponse(0, 3, '2020-06-07')];

    expect(adjustForWeekday(responses)).toBe(responses);
  });
});
