/**
 * Application factory
 * Wires the accident file adapters into the use cases, bound to one configuration
 */

import { createChildLogger } from '../infra/logger/index.js';
import {
  createAccidentRecordLoader,
  createCsvTabularReader,
  loadYears,
  plotState,
  resolveFilename,
  summarizeYears,
  SvgPlotSurface,
  type SvgPlotSurfaceOptions,
  type PlotStateError,
  type PlotStateInput,
  type PlotStateOutcome,
  type RecordLoader,
  type TabularReader,
  type YearInput,
} from '../modules/accidents/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { Logger } from 'pino';
import type { Result } from 'neverthrow';

export interface BuildAppDeps {
  config: Pick<AppConfig, 'data' | 'plot'>;
  logger: Logger;
  /** Override the file reader, e.g. for a different delimiter. */
  reader?: TabularReader;
}

export interface StatePlot {
  outcome: PlotStateOutcome;
  /** Serialized SVG, or null when nothing was rendered. */
  svg: string | null;
}

export const buildApp = (deps: BuildAppDeps) => {
  const logger = createChildLogger(deps.logger, { module: 'accidents' });
  const recordLoader: RecordLoader = createAccidentRecordLoader({
    dataDir: deps.config.data.dir,
    reader: deps.reader ?? createCsvTabularReader(),
    logger,
  });

  const batchDeps = { recordLoader, logger };

  return {
    resolveFilename,
    loadRecords: (filePath: string) => recordLoader.load(filePath),
    loadYears: (years: readonly YearInput[]) => loadYears(batchDeps, years),
    summarizeYears: (years: readonly YearInput[]) => summarizeYears(batchDeps, years),
    plotState: (
      input: PlotStateInput,
      size: Partial<Pick<SvgPlotSurfaceOptions, 'width' | 'height'>> = {}
    ): Result<StatePlot, PlotStateError> => {
      const surface = new SvgPlotSurface({
        width: size.width ?? deps.config.plot.width,
        height: size.height ?? deps.config.plot.height,
      });

      return plotState(
        { recordLoader, mapRenderer: surface, pointPlotter: surface, logger },
        input
      ).map((outcome) => ({
        outcome,
        svg: outcome.status === 'rendered' ? surface.toSvg() : null,
      }));
    },
  };
};

export type App = ReturnType<typeof buildApp>;
