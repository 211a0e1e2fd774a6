import { loadedRows, loadYears, type LoadYearsDeps } from './load-years.js';

import type { SummaryMatrix, SummaryRow, YearInput, YearTaggedRow } from '../types.js';

export type SummarizeYearsDeps = LoadYearsDeps;

const countKey = (month: number, year: number): string => `${String(month)}:${String(year)}`;

/**
 * Pivot (year, month) row counts into a month-by-year matrix.
 * Years ascend left to right, months ascend top to bottom.
 */
export const buildSummaryMatrix = (rows: readonly YearTaggedRow[]): SummaryMatrix => {
  const counts = new Map<string, number>();
  const months = new Set<number>();
  const years = new Set<number>();

  for (const row of rows) {
    const key = countKey(row.month, row.year);
    counts.set(key, (counts.get(key) ?? 0) + 1);
    months.add(row.month);
    years.add(row.year);
  }

  const sortedYears = [...years].sort((a, b) => a - b);
  const sortedMonths = [...months].sort((a, b) => a - b);

  const matrixRows: SummaryRow[] = sortedMonths.map((month) => ({
    month,
    counts: sortedYears.map((year) => counts.get(countKey(month, year)) ?? null),
  }));

  return { years: sortedYears, rows: matrixRows };
};

/**
 * Count accidents per month for each requested year.
 * Years that fail to load are warned about by the batch loader and left out.
 */
export const summarizeYears = (
  deps: SummarizeYearsDeps,
  years: readonly YearInput[]
): SummaryMatrix => buildSummaryMatrix(loadedRows(loadYears(deps, years)));

/**
 * Count for one cell, or null when the year has no rows in that month (or is not a column).
 */
export const getSummaryCount = (matrix: SummaryMatrix, month: number, year: number): number | null => {
  const column = matrix.years.indexOf(year);
  if (column === -1) return null;

  const row = matrix.rows.find((candidate) => candidate.month === month);
  return row?.counts[column] ?? null;
};

/**
 * Fixed-width text rendering: a MONTH column, then one column per year, NA for no value.
 */
export const formatSummaryMatrix = (matrix: SummaryMatrix): string => {
  const header = ['MONTH', ...matrix.years.map(String)];
  const body = matrix.rows.map((row) => [
    String(row.month),
    ...row.counts.map((count) => (count === null ? 'NA' : String(count))),
  ]);

  const widths = header.map((cell, column) =>
    Math.max(cell.length, ...body.map((cells) => cells[column]?.length ?? 0))
  );

  return [header, ...body]
    .map((cells) => cells.map((cell, column) => cell.padStart(widths[column] ?? 0)).join('  '))
    .join('\n');
};
