import { err, ok, type Result } from 'neverthrow';

import { createParseFailureError, type ParseFailureError } from '../errors.js';

import type { AccidentRecord, RecordTable, TabularData, TabularRow } from '../types.js';

/**
 * Accepted header names per field, in lookup order.
 * Yearly files spell the coordinate columns LATITUDE/LONGITUD; a few use LATITUD or LONGITUDE.
 */
const COLUMN_ALIASES = {
  state: ['STATE'],
  month: ['MONTH'],
  latitude: ['LATITUDE', 'LATITUD'],
  longitude: ['LONGITUD', 'LONGITUDE'],
} as const satisfies Record<keyof AccidentRecord, readonly string[]>;

type ColumnMap = Record<keyof AccidentRecord, string>;

const resolveColumns = (
  filePath: string,
  columns: readonly string[]
): Result<ColumnMap, ParseFailureError> => {
  const present = new Set(columns);
  const find = (aliases: readonly string[]): string | undefined =>
    aliases.find((alias) => present.has(alias));

  const state = find(COLUMN_ALIASES.state);
  const month = find(COLUMN_ALIASES.month);
  const latitude = find(COLUMN_ALIASES.latitude);
  const longitude = find(COLUMN_ALIASES.longitude);

  if (
    state === undefined ||
    month === undefined ||
    latitude === undefined ||
    longitude === undefined
  ) {
    const missing = [
      state === undefined ? 'STATE' : null,
      month === undefined ? 'MONTH' : null,
      latitude === undefined ? 'LATITUDE' : null,
      longitude === undefined ? 'LONGITUD' : null,
    ].filter((name): name is string => name !== null);

    return err(
      createParseFailureError(
        filePath,
        `Missing required column(s) in ${filePath}: ${missing.join(', ')}`
      )
    );
  }

  return ok({ state, month, latitude, longitude });
};

const readNumber = (row: TabularRow, column: string): number => {
  const raw = row[column];
  if (raw === undefined || raw.trim() === '') return NaN;
  return Number(raw);
};

// Blank and NA coordinate cells are missing GPS data, not a format error.
const MISSING_CELLS = new Set(['', 'NA']);

const readOptionalNumber = (row: TabularRow, column: string): number | null => {
  const raw = row[column];
  if (raw === undefined || MISSING_CELLS.has(raw.trim())) return null;
  return Number(raw);
};

/**
 * Validate header-keyed rows and build the fixed-schema record table.
 * Row numbers in error details are 1-based and count data rows only.
 */
export const parseRecords = (
  filePath: string,
  data: TabularData
): Result<RecordTable, ParseFailureError> => {
  const columnsResult = resolveColumns(filePath, data.columns);
  if (columnsResult.isErr()) {
    return err(columnsResult.error);
  }

  const columns = columnsResult.value;
  const records: AccidentRecord[] = [];
  const details: string[] = [];

  data.rows.forEach((row, index) => {
    const rowNumber = index + 1;
    const state = readNumber(row, columns.state);
    const month = readNumber(row, columns.month);
    const latitude = readOptionalNumber(row, columns.latitude);
    const longitude = readOptionalNumber(row, columns.longitude);

    if (!Number.isInteger(state)) {
      details.push(`row ${String(rowNumber)}: ${columns.state} '${row[columns.state] ?? ''}' is not an integer`);
    }
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      details.push(`row ${String(rowNumber)}: ${columns.month} '${row[columns.month] ?? ''}' is not a month`);
    }
    if (latitude !== null && !Number.isFinite(latitude)) {
      details.push(`row ${String(rowNumber)}: ${columns.latitude} '${row[columns.latitude] ?? ''}' is not a number`);
    }
    if (longitude !== null && !Number.isFinite(longitude)) {
      details.push(`row ${String(rowNumber)}: ${columns.longitude} '${row[columns.longitude] ?? ''}' is not a number`);
    }

    records.push({ state, month, latitude, longitude });
  });

  if (details.length > 0) {
    return err(
      createParseFailureError(filePath, `Invalid values in ${filePath}`, details)
    );
  }

  return ok(records);
};
