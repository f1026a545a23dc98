/**
 * Calendar day helpers.
 *
 * Days travel through the engine as ISO `YYYY-MM-DD` strings. They sort
 * lexicographically in calendar order, which keeps map keys and output
 * ordering stable. All arithmetic happens in UTC so local time zones and
 * DST never shift a day.
 */

export type IsoDay = string;

const ISO_DAY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

const toUtcMillis = (day: IsoDay): number => {
  const match = ISO_DAY_RE.exec(day);
  if (match === null) {
    throw new RangeError(`Invalid day '${day}', expected YYYY-MM-DD`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
};

const fromUtcMillis = (millis: number): IsoDay => new Date(millis).toISOString().slice(0, 10);

/**
 * True when the string is a real calendar day in `YYYY-MM-DD` form.
 */
export function isIsoDay(value: string): value is IsoDay {
  if (!ISO_DAY_RE.test(value)) return false;
  return fromUtcMillis(toUtcMillis(value)) === value;
}

export function addDays(day: IsoDay, offset: number): IsoDay {
  return fromUtcMillis(toUtcMillis(day) + offset * MS_PER_DAY);
}

/**
 * Number of days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: IsoDay, to: IsoDay): number {
  return Math.round((toUtcMillis(to) - toUtcMillis(from)) / MS_PER_DAY);
}

/**
 * Every day from `first` to `last`, both inclusive. Empty when `last < first`.
 */
export function dayRange(first: IsoDay, last: IsoDay): IsoDay[] {
  const length = daysBetween(first, last) + 1;
  const days: IsoDay[] = [];
  for (let i = 0; i < length; i++) {
    days.push(addDays(first, i));
  }
  return days;
}

/**
 * Saturday or Sunday.
 */
export function isWeekend(day: IsoDay): boolean {
  const weekday = new Date(toUtcMillis(day)).getUTCDay();
  return weekday === 0 || weekday === 6;
}

/**
 * `2020-06-01` -> `20200601`, the form used in export file names.
 */
export function toCompactDay(day: IsoDay): string {
  return day.replaceAll('-', '');
}
