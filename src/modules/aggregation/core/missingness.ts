import { MissingCode, UNDEFINED_SE, type StatisticBundle } from './types.js';

export interface MissingCodes {
  readonly missingValue: MissingCode;
  readonly missingStandardError: MissingCode;
  readonly missingSampleSize: MissingCode;
}

/**
 * Missingness codes for an emitted statistic. Only the standard error can be
 * missing on a row that is written at all.
 */
export function missingCodesFor(statistic: StatisticBundle): MissingCodes {
  return {
    missingValue: MissingCode.NOT_MISSING,
    missingStandardError:
      statistic.standardError === UNDEFINED_SE ? MissingCode.OTHER : MissingCode.NOT_MISSING,
    missingSampleSize: MissingCode.NOT_MISSING,
  };
}
