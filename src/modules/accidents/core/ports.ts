import type { Result } from 'neverthrow';

import type { ParseFailureError, RecordLoadError } from './errors.js';
import type { MapBounds, RecordTable, StatePoint, TabularData } from './types.js';

export interface TabularReader {
  /**
   * Parse one delimited (optionally compressed) file into header-keyed rows.
   * The caller has already checked that the file exists; a read failure after
   * that check (EACCES, EISDIR) is reported as ParseFailure, like a format error.
   */
  read(filePath: string): Result<TabularData, ParseFailureError>;
}

export interface RecordLoader {
  /**
   * Load one year file into a fresh table owned by the caller.
   */
  load(filePath: string): Result<RecordTable, RecordLoadError>;
}

export interface MapRenderer {
  drawBaseMap(bounds: MapBounds): void;
}

export interface PointPlotter {
  /**
   * Overlay points on the current surface. Points with a missing coordinate are not drawn.
   */
  drawPoints(points: readonly StatePoint[]): void;
}
