import { err, ok, type Result } from 'neverthrow';

import { createInvalidArgumentError, type InvalidArgumentError } from '../errors.js';

import type { YearInput } from '../types.js';

const INT32_MAX = 2_147_483_647;

/**
 * Coerce a number or numeric string to an integer, truncating toward zero.
 * Blank strings, non-finite values and values outside the signed 32-bit range are rejected.
 */
export const coerceInteger = (
  value: number | string,
  field: string
): Result<number, InvalidArgumentError> => {
  const numeric = typeof value === 'number' ? value : value.trim() === '' ? NaN : Number(value);

  if (!Number.isFinite(numeric)) {
    return err(
      createInvalidArgumentError(`${field} '${String(value)}' is not coercible to an integer`, value)
    );
  }

  const truncated = Math.trunc(numeric);
  if (Math.abs(truncated) > INT32_MAX) {
    return err(
      createInvalidArgumentError(`${field} '${String(value)}' is out of integer range`, value)
    );
  }

  // Math.trunc(-0.5) is -0
  return ok(truncated === 0 ? 0 : truncated);
};

/**
 * File name for a year that is already an integer.
 */
export const filenameForYear = (year: number): string => `accident_${String(year)}.csv.bz2`;

/**
 * File name of the accident file for a year, e.g. `accident_2015.csv.bz2`.
 */
export const resolveFilename = (year: YearInput): Result<string, InvalidArgumentError> =>
  coerceInteger(year, 'year').map(filenameForYear);
