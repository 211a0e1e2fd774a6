// Repository
export {
  createAccidentRecordLoader,
  type AccidentRecordLoaderOptions,
} from './shell/repo/fs-repo.js';
export { createCsvTabularReader, type CsvTabularReaderOptions } from './shell/reader/csv-reader.js';
export type { MapRenderer, PointPlotter, RecordLoader, TabularReader } from './core/ports.js';

// Rendering
export { SvgPlotSurface, type SvgPlotSurfaceOptions } from './shell/render/svg-plot.js';

// Use cases
export { resolveFilename, coerceInteger } from './core/usecases/resolve-filename.js';
export { parseRecords } from './core/usecases/parse-records.js';
export { loadYears, loadedRows, type LoadYearsDeps } from './core/usecases/load-years.js';
export {
  summarizeYears,
  buildSummaryMatrix,
  getSummaryCount,
  formatSummaryMatrix,
  type SummarizeYearsDeps,
} from './core/usecases/summarize-years.js';
export { plotState, type PlotStateDeps } from './core/usecases/plot-state.js';
export {
  toStatePoints,
  computeBounds,
  LATITUDE_SENTINEL_THRESHOLD,
  LONGITUDE_SENTINEL_THRESHOLD,
} from './core/usecases/normalize-coordinates.js';

// Types
export type {
  AccidentRecord,
  RecordTable,
  TabularData,
  TabularRow,
  YearInput,
  YearTaggedRow,
  YearTaggedTable,
  YearBatchEntry,
  LoadedYear,
  MissingYear,
  SummaryMatrix,
  SummaryRow,
  StatePoint,
  Range,
  MapBounds,
  PlotStateInput,
  PlotStateOutcome,
} from './core/types.js';

// Errors
export type {
  AccidentsError,
  FileNotFoundError,
  InvalidArgumentError,
  InvalidStateError,
  ParseFailureError,
  PlotStateError,
  RecordLoadError,
  UnexpectedError,
} from './core/errors.js';
