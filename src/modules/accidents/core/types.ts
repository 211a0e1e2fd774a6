import type { AccidentsError } from './errors.js';

/**
 * A year as callers pass it: a number, or anything a driver read as text.
 */
export type YearInput = number | string;

/**
 * One accident row, reduced to the columns this module consumes.
 * Coordinates are decimal degrees exactly as stored in the file, sentinels included;
 * null when the cell is blank.
 */
export interface AccidentRecord {
  readonly state: number;
  readonly month: number;
  readonly latitude: number | null;
  readonly longitude: number | null;
}

export type RecordTable = readonly AccidentRecord[];

/**
 * Raw header-keyed cells as produced by a tabular reader.
 */
export type TabularRow = Readonly<Record<string, string>>;

export interface TabularData {
  columns: readonly string[];
  rows: readonly TabularRow[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Year batch
// ─────────────────────────────────────────────────────────────────────────────

export interface YearTaggedRow {
  readonly month: number;
  readonly year: number;
}

export type YearTaggedTable = readonly YearTaggedRow[];

export interface LoadedYear {
  status: 'loaded';
  year: number;
  rows: YearTaggedTable;
}

export interface MissingYear {
  status: 'no-data';
  /** The requested value, unchanged when it could not be coerced to an integer. */
  year: YearInput;
  reason: AccidentsError;
}

export type YearBatchEntry = LoadedYear | MissingYear;

// ─────────────────────────────────────────────────────────────────────────────
// Summary
// ─────────────────────────────────────────────────────────────────────────────

export interface SummaryRow {
  month: number;
  /** Aligned with SummaryMatrix.years; null when that year has no rows for the month. */
  counts: (number | null)[];
}

export interface SummaryMatrix {
  years: number[];
  rows: SummaryRow[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Plotting
// ─────────────────────────────────────────────────────────────────────────────

export interface StatePoint {
  readonly longitude: number | null;
  readonly latitude: number | null;
}

export type Range = readonly [min: number, max: number];

export interface MapBounds {
  latitude: Range;
  longitude: Range;
}

export interface PlotStateInput {
  stateCode: number | string;
  year: YearInput;
}

export type PlotStateOutcome =
  | { status: 'rendered'; pointCount: number; bounds: MapBounds }
  | { status: 'empty' };
