import { scaleLinear, type ScaleLinear } from 'd3';

import type { MapRenderer, PointPlotter } from '../../core/ports.js';
import type { MapBounds, Range, StatePoint } from '../../core/types.js';

export interface SvgPlotSurfaceOptions {
  width?: number;
  height?: number;
  margin?: number;
  pointRadius?: number;
}

// Degrees added on each side when every point shares one coordinate.
const FLAT_RANGE_PADDING = 0.5;

const fmt = (value: number): string => String(Number(value.toFixed(2)));

const widen = ([min, max]: Range): [number, number] =>
  min === max ? [min - FLAT_RANGE_PADDING, max + FLAT_RANGE_PADDING] : [min, max];

/**
 * In-memory SVG plot surface: a graticule base map over the requested bounds,
 * with accident points drawn on top. Longitude runs along x, latitude along y.
 */
export class SvgPlotSurface implements MapRenderer, PointPlotter {
  private readonly width: number;
  private readonly height: number;
  private readonly margin: number;
  private readonly pointRadius: number;
  private readonly elements: string[] = [];
  private projection: {
    x: ScaleLinear<number, number>;
    y: ScaleLinear<number, number>;
  } | null = null;
  private drawn = 0;

  constructor(options: SvgPlotSurfaceOptions = {}) {
    this.width = options.width ?? 800;
    this.height = options.height ?? 600;
    this.margin = options.margin ?? 40;
    this.pointRadius = options.pointRadius ?? 1;
  }

  /** Number of points drawn since the last base map. */
  get pointCount(): number {
    return this.drawn;
  }

  drawBaseMap(bounds: MapBounds): void {
    const x = scaleLinear()
      .domain(widen(bounds.longitude))
      .range([this.margin, this.width - this.margin]);
    const y = scaleLinear()
      .domain(widen(bounds.latitude))
      .range([this.height - this.margin, this.margin]);

    this.projection = { x, y };
    this.drawn = 0;
    this.elements.length = 0;

    const left = this.margin;
    const right = this.width - this.margin;
    const top = this.margin;
    const bottom = this.height - this.margin;

    this.elements.push(
      `<rect class="frame" x="${fmt(left)}" y="${fmt(top)}" width="${fmt(right - left)}" height="${fmt(bottom - top)}" fill="none" stroke="#444"/>`
    );

    for (const lon of x.ticks(5)) {
      const px = fmt(x(lon));
      this.elements.push(
        `<line class="meridian" x1="${px}" y1="${fmt(top)}" x2="${px}" y2="${fmt(bottom)}" stroke="#ddd"/>`,
        `<text x="${px}" y="${fmt(bottom + 14)}" font-size="10" text-anchor="middle">${fmt(lon)}</text>`
      );
    }

    for (const lat of y.ticks(5)) {
      const py = fmt(y(lat));
      this.elements.push(
        `<line class="parallel" x1="${fmt(left)}" y1="${py}" x2="${fmt(right)}" y2="${py}" stroke="#ddd"/>`,
        `<text x="${fmt(left - 4)}" y="${py}" font-size="10" text-anchor="end">${fmt(lat)}</text>`
      );
    }
  }

  drawPoints(points: readonly StatePoint[]): void {
    if (this.projection === null) {
      throw new Error('drawPoints called before drawBaseMap');
    }

    const { x, y } = this.projection;
    for (const point of points) {
      if (point.longitude === null || point.latitude === null) continue;

      this.elements.push(
        `<circle class="accident" cx="${fmt(x(point.longitude))}" cy="${fmt(y(point.latitude))}" r="${fmt(this.pointRadius)}"/>`
      );
      this.drawn += 1;
    }
  }

  toSvg(): string {
    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${String(this.width)}" height="${String(this.height)}" viewBox="0 0 ${String(this.width)} ${String(this.height)}">`,
      ...this.elements.map((element) => `  ${element}`),
      '</svg>',
      '',
    ].join('\n');
  }
}
