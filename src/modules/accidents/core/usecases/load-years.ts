import { Result } from 'neverthrow';

import { createUnexpectedError, type AccidentsError } from '../errors.js';
import { coerceInteger, filenameForYear } from './resolve-filename.js';

import type { RecordLoader } from '../ports.js';
import type {
  LoadedYear,
  RecordTable,
  YearBatchEntry,
  YearInput,
  YearTaggedRow,
} from '../types.js';
import type { Logger } from 'pino';

export interface LoadYearsDeps {
  recordLoader: RecordLoader;
  logger: Logger;
}

// Loader adapters may still throw (I/O races, decoder bugs); keep that inside the year's slot.
const safeLoad = (
  recordLoader: RecordLoader,
  filePath: string
): Result<RecordTable, AccidentsError> =>
  Result.fromThrowable(() => recordLoader.load(filePath), createUnexpectedError)().andThen(
    (records) => records
  );

const loadYear = (
  recordLoader: RecordLoader,
  year: YearInput
): Result<LoadedYear, AccidentsError> =>
  coerceInteger(year, 'year').andThen((yearValue) =>
    safeLoad(recordLoader, filenameForYear(yearValue)).map(
      (records): LoadedYear => ({
        status: 'loaded',
        year: yearValue,
        rows: records.map((record) => ({ month: record.month, year: yearValue })),
      })
    )
  );

/**
 * Load several yearly files, one slot per requested year, in request order.
 *
 * A year that cannot be loaded never aborts the batch: its slot is marked
 * `no-data` with the reason, and one warning naming the year is logged.
 * Each year is attempted exactly once, duplicates included.
 */
export const loadYears = (deps: LoadYearsDeps, years: readonly YearInput[]): YearBatchEntry[] => {
  const log = deps.logger.child({ usecase: 'loadYears' });

  return years.map((year): YearBatchEntry => {
    const result = loadYear(deps.recordLoader, year);

    if (result.isErr()) {
      log.warn(
        { year, reason: result.error.type, detail: result.error.message },
        `invalid year: ${String(year)}`
      );
      return { status: 'no-data', year, reason: result.error };
    }

    log.debug({ year: result.value.year, rows: result.value.rows.length }, 'Loaded year');
    return result.value;
  });
};

/**
 * Row-wise union of every loaded slot; no-data slots contribute nothing.
 */
export const loadedRows = (entries: readonly YearBatchEntry[]): YearTaggedRow[] =>
  entries.flatMap((entry) => (entry.status === 'loaded' ? entry.rows : []));
