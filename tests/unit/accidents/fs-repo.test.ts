import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { err } from 'neverthrow';
import pinoLogger from 'pino';
import { describe, expect, it } from 'vitest';

import { createParseFailureError } from '@/modules/accidents/core/errors.js';
import { createCsvTabularReader } from '@/modules/accidents/shell/reader/csv-reader.js';
import { createAccidentRecordLoader } from '@/modules/accidents/shell/repo/fs-repo.js';

import {
  FIXTURES_DIR,
  createRecord,
  makeTempDir,
  toAccidentCsv,
  writeAccidentFile,
} from '../../fixtures/builders.js';

import type { TabularReader } from '@/modules/accidents/core/ports.js';

const testLogger = pinoLogger({ level: 'silent' });

const makeLoader = (dataDir: string, reader: TabularReader = createCsvTabularReader()) =>
  createAccidentRecordLoader({ dataDir, reader, logger: testLogger });

describe('fs accident record loader', () => {
  it('loads a bzip2-compressed year file', () => {
    const result = makeLoader(FIXTURES_DIR).load('accident_2014.csv.bz2');

    expect(result._unsafeUnwrap()).toEqual([
      { state: 1, month: 1, latitude: 33.5, longitude: -86.8 },
      { state: 1, month: 1, latitude: 32.4, longitude: -87.1 },
      { state: 1, month: 2, latitude: 99.9999, longitude: 999.9999 },
      { state: 6, month: 2, latitude: 36.7, longitude: -119.7 },
    ]);
  });

  it('decodes every stream of a multi-stream bzip2 file', () => {
    const result = makeLoader(FIXTURES_DIR).load('accident_2016.csv.bz2');

    expect(result._unsafeUnwrap()).toEqual([
      { state: 4, month: 3, latitude: 33.4, longitude: -112.1 },
      { state: 4, month: 3, latitude: 32.2, longitude: -110.9 },
      { state: 4, month: 5, latitude: null, longitude: -111.8 },
    ]);
  });

  it('loads plain CSV text', async () => {
    const dir = await makeTempDir();
    await writeAccidentFile(dir, 2013, toAccidentCsv([createRecord({ month: 4 })]));

    const result = makeLoader(dir).load('accident_2013.csv.bz2');

    expect(result._unsafeUnwrap()).toEqual([
      { state: 1, month: 4, latitude: 33.5, longitude: -86.8 },
    ]);
  });

  it('accepts absolute paths', async () => {
    const dir = await makeTempDir();
    const filePath = await writeAccidentFile(dir, 2013, toAccidentCsv([createRecord()]));

    const result = makeLoader('/nonexistent').load(filePath);

    expect(result._unsafeUnwrap()).toHaveLength(1);
  });

  it('fails with FileNotFound naming the path', async () => {
    const dir = await makeTempDir();

    const result = makeLoader(dir).load('accident_1999.csv.bz2');

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'FileNotFound',
      message: "file 'accident_1999.csv.bz2' does not exist",
      path: 'accident_1999.csv.bz2',
    });
  });

  it('treats a directory as a missing file', async () => {
    const dir = await makeTempDir();
    await mkdir(path.join(dir, 'accident_2000.csv.bz2'));

    const result = makeLoader(dir).load('accident_2000.csv.bz2');

    expect(result._unsafeUnwrapErr().type).toBe('FileNotFound');
  });

  it('treats a path under a regular file as a missing file', async () => {
    const dir = await makeTempDir();
    await writeFile(path.join(dir, 'afile'), 'not a directory');

    const result = makeLoader(dir).load('afile/accident_2015.csv.bz2');

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'FileNotFound',
      message: "file 'afile/accident_2015.csv.bz2' does not exist",
      path: 'afile/accident_2015.csv.bz2',
    });
  });

  it('returns the reader failure unchanged', async () => {
    const dir = await makeTempDir();
    await writeAccidentFile(dir, 2013, 'anything');
    const failure = createParseFailureError('x', 'reader says no');
    const reader: TabularReader = { read: () => err(failure) };

    const result = makeLoader(dir, reader).load('accident_2013.csv.bz2');

    expect(result._unsafeUnwrapErr()).toBe(failure);
  });

  it('fails with ParseFailure when a required column is missing', async () => {
    const dir = await makeTempDir();
    await writeAccidentFile(dir, 2010, 'STATE,LATITUDE,LONGITUD\n1,33.5,-86.8\n');

    const result = makeLoader(dir).load('accident_2010.csv.bz2');

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'ParseFailure',
      message: 'Missing required column(s) in accident_2010.csv.bz2: MONTH',
      path: 'accident_2010.csv.bz2',
    });
  });

  it('fails with ParseFailure on a ragged row', async () => {
    const dir = await makeTempDir();
    await writeAccidentFile(dir, 2011, 'STATE,MONTH,LATITUDE,LONGITUD\n1,2\n');

    const error = makeLoader(dir).load('accident_2011.csv.bz2')._unsafeUnwrapErr();

    expect(error.type).toBe('ParseFailure');
    expect(error.message.startsWith('Failed to parse ')).toBe(true);
  });

  it('fails with ParseFailure on a corrupt bzip2 stream', async () => {
    const dir = await makeTempDir();
    await writeFile(path.join(dir, 'accident_2012.csv.bz2'), Buffer.from('BZh9 not really bzip2'));

    const error = makeLoader(dir).load('accident_2012.csv.bz2')._unsafeUnwrapErr();

    expect(error.type).toBe('ParseFailure');
    expect(error.message.startsWith('Failed to decompress ')).toBe(true);
  });

  it('reports a read failure from the reader as ParseFailure', async () => {
    const dir = await makeTempDir();

    const error = createCsvTabularReader().read(dir)._unsafeUnwrapErr();

    expect(error.type).toBe('ParseFailure');
    expect(error.path).toBe(dir);
    expect(error.message.startsWith(`Failed to read ${dir}: `)).toBe(true);
  });

  it('honours a custom delimiter', async () => {
    const dir = await makeTempDir();
    await writeAccidentFile(dir, 2009, 'STATE;MONTH;LATITUDE;LONGITUD\n4;7;33.4;-112.1\n');

    const result = makeLoader(dir, createCsvTabularReader({ delimiter: ';' })).load(
      'accident_2009.csv.bz2'
    );

    expect(result._unsafeUnwrap()).toEqual([
      { state: 4, month: 7, latitude: 33.4, longitude: -112.1 },
    ]);
  });
});
