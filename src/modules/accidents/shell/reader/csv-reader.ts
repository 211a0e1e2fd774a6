import fs from 'node:fs';

import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';
import bunzip from 'seek-bzip';

import { errorMessage } from '../../../../common/types/errors.js';
import { createParseFailureError, type ParseFailureError } from '../../core/errors.js';

import type { TabularReader } from '../../core/ports.js';
import type { TabularData, TabularRow } from '../../core/types.js';

// Every bzip2 stream starts with "BZh" followed by the block size digit.
const BZIP2_SIGNATURE = [0x42, 0x5a, 0x68] as const;

export interface CsvTabularReaderOptions {
  delimiter?: string;
}

const isBzip2 = (buffer: Buffer): boolean =>
  buffer.length >= BZIP2_SIGNATURE.length &&
  BZIP2_SIGNATURE.every((byte, index) => buffer[index] === byte);

const isStringMatrix = (value: unknown): value is string[][] =>
  Array.isArray(value) &&
  value.every(
    (row) => Array.isArray(row) && row.every((cell: unknown) => typeof cell === 'string')
  );

const decodeText = (filePath: string, buffer: Buffer): Result<string, ParseFailureError> => {
  if (!isBzip2(buffer)) {
    return ok(buffer.toString('utf8'));
  }

  try {
    // Parallel compressors write several concatenated streams; decode them all.
    return ok(bunzip.decode(buffer, undefined, true).toString('utf8'));
  } catch (error) {
    return err(
      createParseFailureError(filePath, `Failed to decompress ${filePath}: ${errorMessage(error)}`)
    );
  }
};

/**
 * Delimited-file reader for the yearly accident files.
 * bzip2 input is recognised by its signature; anything else is read as plain UTF-8 text.
 */
export const createCsvTabularReader = (options: CsvTabularReaderOptions = {}): TabularReader => {
  const delimiter = options.delimiter ?? ',';

  return {
    read(filePath: string): Result<TabularData, ParseFailureError> {
      let buffer: Buffer;
      try {
        buffer = fs.readFileSync(filePath);
      } catch (error) {
        return err(
          createParseFailureError(filePath, `Failed to read ${filePath}: ${errorMessage(error)}`)
        );
      }

      const textResult = decodeText(filePath, buffer);
      if (textResult.isErr()) {
        return err(textResult.error);
      }

      let parsed: unknown;
      try {
        parsed = parse(textResult.value, {
          delimiter,
          bom: true,
          skip_empty_lines: true,
          trim: true,
        });
      } catch (error) {
        return err(
          createParseFailureError(filePath, `Failed to parse ${filePath}: ${errorMessage(error)}`)
        );
      }

      if (!isStringMatrix(parsed)) {
        return err(createParseFailureError(filePath, `Unexpected parser output for ${filePath}`));
      }

      const [header = [], ...body] = parsed;
      const rows: TabularRow[] = body.map((cells) =>
        Object.fromEntries(header.map((column, index) => [column, cells[index] ?? '']))
      );

      return ok({ columns: header, rows });
    },
  };
};
