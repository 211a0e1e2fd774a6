import fs from 'node:fs';
import path from 'node:path';

import { err, type Result } from 'neverthrow';

import { createFileNotFoundError, type RecordLoadError } from '../../core/errors.js';
import { parseRecords } from '../../core/usecases/parse-records.js';

import type { RecordLoader, TabularReader } from '../../core/ports.js';
import type { RecordTable } from '../../core/types.js';
import type { Logger } from 'pino';

export interface AccidentRecordLoaderOptions {
  /** Directory that relative file paths resolve against. */
  dataDir: string;
  reader: TabularReader;
  logger: Logger;
}

// ENOTDIR and EACCES throw even with throwIfNoEntry off; any stat failure means no readable file.
const isRegularFile = (filePath: string): boolean => {
  try {
    return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() === true;
  } catch {
    return false;
  }
};

export const createAccidentRecordLoader = (options: AccidentRecordLoaderOptions): RecordLoader => {
  const log = options.logger.child({ component: 'accidentRecordLoader' });

  return {
    load(filePath: string): Result<RecordTable, RecordLoadError> {
      const absolutePath = path.resolve(options.dataDir, filePath);

      if (!isRegularFile(absolutePath)) {
        return err(createFileNotFoundError(filePath));
      }

      log.debug({ filePath: absolutePath }, 'Reading accident file');

      return options.reader
        .read(absolutePath)
        .andThen((data) => parseRecords(filePath, data))
        .map((records) => {
          log.debug({ filePath: absolutePath, rows: records.length }, 'Loaded accident file');
          return records;
        });
    },
  };
};
