import type { AccidentRecord, MapBounds, Range, StatePoint } from '../types.js';

/**
 * FARS encodes unknown GPS positions with out-of-range values
 * (longitude 999.9999 / 888.8888 / 777.7777, latitude 99.9999 / 88.8888 / 77.7777).
 * This threshold check is specific to that file convention.
 */
export const LONGITUDE_SENTINEL_THRESHOLD = 900;
export const LATITUDE_SENTINEL_THRESHOLD = 90;

/**
 * Build plot points from records, turning sentinel coordinates into null.
 * Blank coordinates are already null and stay so.
 * Returns new objects; the records are left untouched.
 */
const belowThreshold = (value: number | null, threshold: number): number | null =>
  value === null || value > threshold ? null : value;

export const toStatePoints = (records: readonly AccidentRecord[]): StatePoint[] =>
  records.map((record) => ({
    longitude: belowThreshold(record.longitude, LONGITUDE_SENTINEL_THRESHOLD),
    latitude: belowThreshold(record.latitude, LATITUDE_SENTINEL_THRESHOLD),
  }));

const rangeOf = (values: readonly (number | null)[]): Range | null => {
  let min = Infinity;
  let max = -Infinity;

  for (const value of values) {
    if (value === null) continue;
    if (value < min) min = value;
    if (value > max) max = value;
  }

  return min <= max ? [min, max] : null;
};

/**
 * Axis bounds over the known values of each axis, or null when either axis has none.
 */
export const computeBounds = (points: readonly StatePoint[]): MapBounds | null => {
  const latitude = rangeOf(points.map((point) => point.latitude));
  const longitude = rangeOf(points.map((point) => point.longitude));

  if (latitude === null || longitude === null) {
    return null;
  }

  return { latitude, longitude };
};
