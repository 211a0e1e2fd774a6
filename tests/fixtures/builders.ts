/**
 * Test data builders for accident files and records
 */

import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { AccidentRecord } from '@/modules/accidents/core/types.js';

export const FIXTURES_DIR = path.dirname(fileURLToPath(import.meta.url));

export const makeTempDir = async (): Promise<string> => {
  return mkdtemp(path.join(tmpdir(), 'fars-'));
};

export const createRecord = (overrides: Partial<AccidentRecord> = {}): AccidentRecord => ({
  state: 1,
  month: 1,
  latitude: 33.5,
  longitude: -86.8,
  ...overrides,
});

/**
 * CSV text with the column layout of the yearly files.
 */
export const toAccidentCsv = (
  records: readonly AccidentRecord[],
  header: readonly string[] = ['STATE', 'MONTH', 'LATITUDE', 'LONGITUD']
): string => {
  const lines = records.map((record) =>
    [record.state, record.month, record.latitude, record.longitude]
      .map((value) => (value === null ? '' : String(value)))
      .join(',')
  );
  return [header.join(','), ...lines].join('\n') + '\n';
};

/**
 * Writes `accident_<year>.csv.bz2` as plain CSV text; the reader only
 * decompresses input that carries the bzip2 signature.
 */
export const writeAccidentFile = async (
  dir: string,
  year: number,
  contents: string
): Promise<string> => {
  const filePath = path.join(dir, `accident_${String(year)}.csv.bz2`);
  await writeFile(filePath, contents, 'utf8');
  return filePath;
};

/**
 * `count` records of one state in one month.
 */
export const monthRecords = (month: number, count: number, state = 1): AccidentRecord[] =>
  Array.from({ length: count }, () => createRecord({ month, state }));
