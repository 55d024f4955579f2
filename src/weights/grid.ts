import crypto from 'crypto';
import type { EngineConfig } from '../config';
import { ConfigurationError } from '../errors';
import type { Anchor, WeightGrid, WeightGridMeta } from '../types';
import { axis, normalizeLon, round } from '../utils/numeric';
import { createLogger } from '../utils/logger';

const logger = createLogger('WeightGrid');

const WEIGHT_FORMULA = 'demand × sensitivity (2-D Gaussian spread, independent sigma per axis)';

export interface WeightCell {
  lat: number;
  lon: number;
  weight: number;
}

/**
 * Stable fingerprint of an anchor table; the persisted grid is rebuilt when it changes.
 */
export function anchorsFingerprint(anchors: readonly Anchor[]): string {
  const canonical = anchors
    .map(a => [a.id, a.lat, normalizeLon(a.lon), a.demand, a.sensitivity].join('|'))
    .join('\n');
  return crypto.createHash('sha256').update(canonical).digest('hex');
}

export class WeightGridBuilder {
  private config: Pick<EngineConfig, 'region' | 'gridResolution' | 'kernelSigma'>;

  constructor(config: Pick<EngineConfig, 'region' | 'gridResolution' | 'kernelSigma'>) {
    this.config = config;
  }

  axes(): { lats: number[]; lons: number[] } {
    const { region, gridResolution } = this.config;
    return {
      lats: axis(region.latMin, region.latMax, gridResolution),
      lons: axis(region.lonMin, region.lonMax, gridResolution),
    };
  }

  /**
   * Spread every anchor's combined weight over the grid with a Gaussian kernel
   * centred on its centroid, then normalise the grid to unit mass.
   */
  build(anchors: readonly Anchor[]): WeightGrid {
    const { region, gridResolution, kernelSigma } = this.config;

    if (anchors.length === 0) {
      throw new ConfigurationError('Anchor table is empty; a weight grid needs at least one anchor');
    }
    if (!(gridResolution > 0) || !(kernelSigma.lat > 0) || !(kernelSigma.lon > 0)) {
      throw new ConfigurationError(
        `Grid resolution and kernel sigmas must be positive (resolution=${gridResolution}, sigma=${kernelSigma.lat}/${kernelSigma.lon})`
      );
    }
    for (const anchor of anchors) {
      if (anchor.demand < 0 || anchor.sensitivity < 0) {
        throw new ConfigurationError(`Anchor ${anchor.id} has a negative demand or sensitivity`);
      }
    }

    const { lats, lons } = this.axes();
    const grid: number[][] = lats.map(() => new Array<number>(lons.length).fill(0));
    const twoSigmaLat2 = 2 * kernelSigma.lat ** 2;
    const twoSigmaLon2 = 2 * kernelSigma.lon ** 2;

    for (const anchor of anchors) {
      const weight = anchor.demand * anchor.sensitivity;
      if (weight === 0) continue;
      const anchorLon = normalizeLon(anchor.lon);
      for (let i = 0; i < lats.length; i++) {
        const latTerm = (lats[i] - anchor.lat) ** 2 / twoSigmaLat2;
        const row = grid[i];
        for (let j = 0; j < lons.length; j++) {
          row[j] += weight * Math.exp(-latTerm - (lons[j] - anchorLon) ** 2 / twoSigmaLon2);
        }
      }
    }

    let total = 0;
    for (const row of grid) {
      for (const value of row) total += value;
    }
    if (!(total > 0) || !Number.isFinite(total)) {
      throw new ConfigurationError(`Weight grid has no usable mass (total=${total}); check anchor magnitudes`);
    }

    const values = grid.map(row => Object.freeze(row.map(value => value / total)));

    const meta: WeightGridMeta = {
      ...region,
      resolution: gridResolution,
      nLats: lats.length,
      nLons: lons.length,
      convention: 'lon in 0-360',
      weightFormula: WEIGHT_FORMULA,
      sigmaLat: kernelSigma.lat,
      sigmaLon: kernelSigma.lon,
      anchorCount: anchors.length,
      anchorsHash: anchorsFingerprint(anchors),
      note: 'Weights normalised to sum=1 across the region grid',
    };

    logger.info(`Built weight grid ${lats.length} × ${lons.length} from ${anchors.length} anchors`);

    return Object.freeze({
      lats: Object.freeze(lats),
      lons: Object.freeze(lons),
      values: Object.freeze(values),
      meta: Object.freeze(meta),
    });
  }

  /**
   * Highest-weight cells, heaviest first.
   */
  topCells(grid: WeightGrid, count: number): WeightCell[] {
    const cells: WeightCell[] = [];
    grid.values.forEach((row, i) => {
      row.forEach((weight, j) => {
        cells.push({ lat: grid.lats[i], lon: grid.lons[j], weight });
      });
    });
    cells.sort((a, b) => b.weight - a.weight);
    return cells.slice(0, count);
  }

  peak(grid: WeightGrid): WeightCell {
    const [top] = this.topCells(grid, 1);
    return top;
  }

  describe(grid: WeightGrid): string {
    const top = this.topCells(grid, 5)
      .map(c => `lat=${c.lat.toFixed(2)} lon=${c.lon.toFixed(2)} weight=${round(c.weight, 6)}`)
      .join('; ');
    return `${grid.meta.nLats} × ${grid.meta.nLons} grid @ ${grid.meta.resolution}°, top cells: ${top}`;
  }
}
