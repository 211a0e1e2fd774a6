import { err, ok, type Result } from 'neverthrow';

import { createInvalidStateError, type PlotStateError } from '../errors.js';
import { computeBounds, toStatePoints } from './normalize-coordinates.js';
import { coerceInteger, resolveFilename } from './resolve-filename.js';

import type { MapRenderer, PointPlotter, RecordLoader } from '../ports.js';
import type { PlotStateInput, PlotStateOutcome } from '../types.js';
import type { Logger } from 'pino';

export interface PlotStateDeps {
  recordLoader: RecordLoader;
  mapRenderer: MapRenderer;
  pointPlotter: PointPlotter;
  logger: Logger;
}

/**
 * Draw the accidents of one state and year onto the plot surface.
 *
 * Load failures are returned as-is. A state code that never appears in the
 * year's STATE column is an InvalidState error; a state with no rows to draw
 * is logged and reported as `empty` without touching the surface.
 */
export const plotState = (
  deps: PlotStateDeps,
  input: PlotStateInput
): Result<PlotStateOutcome, PlotStateError> => {
  const log = deps.logger.child({ usecase: 'plotState' });

  const fileNameResult = resolveFilename(input.year);
  if (fileNameResult.isErr()) {
    return err(fileNameResult.error);
  }

  const recordsResult = deps.recordLoader.load(fileNameResult.value);
  if (recordsResult.isErr()) {
    return err(recordsResult.error);
  }
  const records = recordsResult.value;

  const stateResult = coerceInteger(input.stateCode, 'state code');
  if (stateResult.isErr()) {
    return err(stateResult.error);
  }
  const stateCode = stateResult.value;

  if (!records.some((record) => record.state === stateCode)) {
    return err(createInvalidStateError(stateCode));
  }

  const stateRecords = records.filter((record) => record.state === stateCode);
  if (stateRecords.length === 0) {
    log.info({ stateCode, year: input.year }, 'no accidents to plot');
    return ok({ status: 'empty' });
  }

  const points = toStatePoints(stateRecords);
  const bounds = computeBounds(points);
  if (bounds === null) {
    log.info({ stateCode, year: input.year }, 'no accidents with known coordinates to plot');
    return ok({ status: 'empty' });
  }

  deps.mapRenderer.drawBaseMap(bounds);
  deps.pointPlotter.drawPoints(points);

  log.debug({ stateCode, year: input.year, points: points.length }, 'Plotted state accidents');
  return ok({ status: 'rendered', pointCount: points.length, bounds });
};
