import type { EngineConfig, RegionBounds } from '../config';
import { toFahrenheit } from '../degree-day';
import { EmptyFieldError } from '../errors';
import type { FieldAggregate, TemperatureField, WeightGrid } from '../types';
import { normalizeLon } from '../utils/numeric';
import { createLogger } from '../utils/logger';

const logger = createLogger('FieldAggregator');

export interface FieldCell {
  lat: number;
  lon: number;   // 0-360
  tempF: number;
}

function inBounds(lat: number, lon: number, bounds: RegionBounds): boolean {
  return lat >= bounds.latMin && lat <= bounds.latMax && lon >= bounds.lonMin && lon <= bounds.lonMax;
}

/**
 * Position of x on an ascending axis as (lower index, fraction to the next
 * node). Null when x lies outside the axis.
 */
function locate(axisValues: readonly number[], x: number): { index: number; fraction: number } | null {
  const n = axisValues.length;
  if (n === 0 || x < axisValues[0] || x > axisValues[n - 1]) return null;
  if (n === 1) return { index: 0, fraction: 0 };

  let lo = 0;
  let hi = n - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (axisValues[mid] <= x) lo = mid;
    else hi = mid;
  }
  const span = axisValues[hi] - axisValues[lo];
  return { index: lo, fraction: span === 0 ? 0 : (x - axisValues[lo]) / span };
}

/**
 * Bilinear interpolation of the weight grid at one location. Locations outside
 * the grid get zero weight; negative results are clamped to zero.
 */
export function interpolateWeight(grid: WeightGrid, lat: number, lon: number): number {
  const y = locate(grid.lats, lat);
  const x = locate(grid.lons, normalizeLon(lon));
  if (!y || !x) return 0;

  const i1 = Math.min(y.index + 1, grid.lats.length - 1);
  const j1 = Math.min(x.index + 1, grid.lons.length - 1);
  const v00 = grid.values[y.index][x.index];
  const v01 = grid.values[y.index][j1];
  const v10 = grid.values[i1][x.index];
  const v11 = grid.values[i1][j1];

  const top = v00 * (1 - x.fraction) + v01 * x.fraction;
  const bottom = v10 * (1 - x.fraction) + v11 * x.fraction;
  const value = top * (1 - y.fraction) + bottom * y.fraction;
  return Number.isFinite(value) ? Math.max(value, 0) : 0;
}

/**
 * Reduces one temperature field to a simple regional mean and a
 * demand-weighted mean.
 */
export class FieldAggregator {
  private region: RegionBounds;

  constructor(
    config: Pick<EngineConfig, 'region'>,
    private weights: WeightGrid | null = null
  ) {
    this.region = config.region;
  }

  /**
   * Cells of the field inside the bounds, converted to °F. Longitudes are
   * normalised to 0-360 first; either latitude ordering works.
   */
  crop(field: TemperatureField, bounds: RegionBounds = this.region): FieldCell[] {
    const cells: FieldCell[] = [];

    switch (field.kind) {
      case 'scalar': {
        // A scalar is already a regional value
        if (Number.isFinite(field.value)) {
          cells.push({ lat: NaN, lon: NaN, tempF: toFahrenheit(field.value, field.unit) });
        }
        break;
      }
      case 'grid': {
        const lons = field.lons.map(normalizeLon);
        field.lats.forEach((lat, i) => {
          if (lat < bounds.latMin || lat > bounds.latMax) return;
          const row = field.values[i];
          lons.forEach((lon, j) => {
            const value = row[j];
            if (lon < bounds.lonMin || lon > bounds.lonMax || !Number.isFinite(value)) return;
            cells.push({ lat, lon, tempF: toFahrenheit(value, field.unit) });
          });
        });
        break;
      }
      case 'points': {
        field.points.forEach((point, k) => {
          const lon = normalizeLon(point.lon);
          const value = field.values[k];
          if (!inBounds(point.lat, lon, bounds) || !Number.isFinite(value)) return;
          cells.push({ lat: point.lat, lon, tempF: toFahrenheit(value, field.unit) });
        });
        break;
      }
    }

    return cells;
  }

  /**
   * Throws EmptyFieldError when nothing survives the crop.
   */
  aggregate(field: TemperatureField): FieldAggregate {
    const cells = this.crop(field);
    if (cells.length === 0) {
      throw new EmptyFieldError(`Field has no finite cells inside the region (${field.kind})`);
    }

    let total = 0;
    for (const cell of cells) total += cell.tempF;
    const meanTemp = total / cells.length;

    if (field.kind === 'scalar' || !this.weights) {
      return { meanTemp, meanTempGw: meanTemp, weighted: false, cells: cells.length };
    }

    const meanTempGw = this.weightedMean(cells, this.weights);
    if (meanTempGw === null) {
      logger.warn(`Resampled weights sum to zero over ${cells.length} cells; using simple mean`);
      return { meanTemp, meanTempGw: meanTemp, weighted: false, cells: cells.length };
    }

    return { meanTemp, meanTempGw, weighted: true, cells: cells.length };
  }

  /**
   * Weighted mean with the weight grid resampled onto the cells. Null when the
   * resampled weights carry no mass.
   */
  weightedMean(cells: readonly FieldCell[], weights: WeightGrid): number | null {
    let weightTotal = 0;
    let weightedSum = 0;
    for (const cell of cells) {
      const w = interpolateWeight(weights, cell.lat, cell.lon);
      weightTotal += w;
      weightedSum += w * cell.tempF;
    }
    if (weightTotal === 0) return null;
    return weightedSum / weightTotal;
  }

  /**
   * Coldest cell inside the bounds, or null when the crop is empty.
   */
  cropMinimum(field: TemperatureField, bounds: RegionBounds): number | null {
    if (field.kind === 'scalar') return null;
    const cells = this.crop(field, bounds);
    if (cells.length === 0) return null;
    return cells.reduce((min, c) => Math.min(min, c.tempF), Infinity);
  }
}
