import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { EngineConfig } from '../config';
import { ConfigurationError, MissingInputError, errorMessage } from '../errors';
import { readJsonFile } from '../io/files';
import type { Anchor, WeightGrid } from '../types';
import { axis, normalizeLon } from '../utils/numeric';
import { createLogger } from '../utils/logger';
import { WeightGridBuilder, anchorsFingerprint } from './grid';

const logger = createLogger('WeightGridStore');

export const WEIGHTS_FILE = 'conus_demand_weights.json';
export const WEIGHTS_META_FILE = 'conus_demand_weights_meta.json';

const MASS_TOLERANCE = 1e-6;

const AnchorSchema = z.object({
  id: z.string().min(1),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(360),
  demand: z.number().nonnegative(),
  sensitivity: z.number().nonnegative(),
});

const AnchorFileSchema = z.object({
  description: z.string().optional(),
  anchors: z.array(AnchorSchema),
});

const WeightMetaSchema = z.object({
  latMin: z.number(),
  latMax: z.number(),
  lonMin: z.number(),
  lonMax: z.number(),
  resolution: z.number().positive(),
  nLats: z.number().int().positive(),
  nLons: z.number().int().positive(),
  convention: z.literal('lon in 0-360'),
  weightFormula: z.string(),
  sigmaLat: z.number().positive(),
  sigmaLon: z.number().positive(),
  anchorCount: z.number().int().nonnegative(),
  anchorsHash: z.string(),
  note: z.string(),
});

const WeightValuesSchema = z.array(z.array(z.number().nonnegative()));

// A weight configuration that cannot be parsed is a configuration error, not a missing input
function readConfigJson(file: string): unknown {
  try {
    return readJsonFile(file);
  } catch (error) {
    throw new ConfigurationError(`Unreadable weight configuration ${file}: ${errorMessage(error)}`);
  }
}

/**
 * Load an anchor table. Longitudes given in -180..180 are converted to 0-360.
 */
export function loadAnchors(file: string): Anchor[] {
  if (!fs.existsSync(file)) {
    throw new MissingInputError(`Anchor table not found: ${file}`, file);
  }
  const parsed = AnchorFileSchema.safeParse(readConfigJson(file));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid anchor table ${file}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }
  if (parsed.data.anchors.length === 0) {
    throw new ConfigurationError(`Anchor table ${file} is empty`);
  }
  return parsed.data.anchors.map(a => ({ ...a, lon: normalizeLon(a.lon) }));
}

/**
 * Persists the weight grid as a JSON 2-D array plus a sidecar metadata record.
 */
export class WeightGridStore {
  private builder: WeightGridBuilder;

  constructor(
    private dir: string,
    private config: Pick<EngineConfig, 'region' | 'gridResolution' | 'kernelSigma'>
  ) {
    this.builder = new WeightGridBuilder(config);
  }

  get weightsPath(): string {
    return path.join(this.dir, WEIGHTS_FILE);
  }

  get metaPath(): string {
    return path.join(this.dir, WEIGHTS_META_FILE);
  }

  save(grid: WeightGrid): void {
    fs.mkdirSync(this.dir, { recursive: true });
    fs.writeFileSync(this.weightsPath, JSON.stringify(grid.values));
    fs.writeFileSync(this.metaPath, JSON.stringify(grid.meta, null, 2));
    logger.info(`Saved weight grid ${grid.meta.nLats} × ${grid.meta.nLons} to ${this.dir}`);
  }

  /**
   * Returns null when no grid has been persisted yet.
   */
  load(): WeightGrid | null {
    if (!fs.existsSync(this.weightsPath) || !fs.existsSync(this.metaPath)) {
      logger.warn(`Weight grid not found in ${this.dir}`);
      return null;
    }

    const meta = WeightMetaSchema.safeParse(readConfigJson(this.metaPath));
    if (!meta.success) {
      throw new ConfigurationError(`Invalid weight grid metadata ${this.metaPath}: ${meta.error.issues[0]?.message ?? 'unknown error'}`);
    }
    const values = WeightValuesSchema.safeParse(readConfigJson(this.weightsPath));
    if (!values.success) {
      throw new ConfigurationError(`Invalid weight grid ${this.weightsPath}: ${values.error.issues[0]?.message ?? 'unknown error'}`);
    }

    const m = meta.data;
    const lats = axis(m.latMin, m.latMax, m.resolution);
    const lons = axis(m.lonMin, m.lonMax, m.resolution);
    if (lats.length !== m.nLats || lons.length !== m.nLons) {
      throw new ConfigurationError(`Weight grid metadata axes (${lats.length} × ${lons.length}) disagree with counts (${m.nLats} × ${m.nLons})`);
    }
    if (values.data.length !== m.nLats || values.data.some(row => row.length !== m.nLons)) {
      throw new ConfigurationError(`Weight grid shape does not match metadata (${m.nLats} × ${m.nLons})`);
    }

    let total = 0;
    for (const row of values.data) {
      for (const v of row) total += v;
    }
    if (Math.abs(total - 1) > MASS_TOLERANCE) {
      throw new ConfigurationError(`Weight grid mass is ${total}, expected 1`);
    }

    return Object.freeze({
      lats: Object.freeze(lats),
      lons: Object.freeze(lons),
      values: Object.freeze(values.data.map(row => Object.freeze(row))),
      meta: Object.freeze(m),
    });
  }

  /**
   * Use the cached grid unless it was built from a different anchor table or
   * region definition.
   */
  loadOrBuild(anchors: readonly Anchor[]): WeightGrid {
    const cached = this.load();
    const { region, gridResolution, kernelSigma } = this.config;
    if (
      cached &&
      cached.meta.anchorsHash === anchorsFingerprint(anchors) &&
      cached.meta.resolution === gridResolution &&
      cached.meta.sigmaLat === kernelSigma.lat &&
      cached.meta.sigmaLon === kernelSigma.lon &&
      cached.meta.latMin === region.latMin &&
      cached.meta.latMax === region.latMax &&
      cached.meta.lonMin === region.lonMin &&
      cached.meta.lonMax === region.lonMax
    ) {
      logger.debug('Using cached weight grid');
      return cached;
    }

    if (cached) {
      logger.info('Anchor table or grid definition changed; rebuilding weight grid');
    }
    const grid = this.builder.build(anchors);
    this.save(grid);
    return grid;
  }
}
