import dotenv from 'dotenv';
import path from 'path';
import { DateTime } from 'luxon';

// Load environment variables
dotenv.config();

// Bounding box; longitudes are always in the 0-360 convention
export interface RegionBounds {
  latMin: number;
  latMax: number;
  lonMin: number;
  lonMax: number;
}

export interface KernelSigma {
  lat: number;
  lon: number;
}

export interface ModelFamilies {
  physics: readonly string[];
  ai: readonly string[];
}

export interface ModelInferenceRule {
  pattern: string;  // case-insensitive substring of the source path
  model: string;
}

export interface CompositeSettings {
  coldThreshold: number;
  coldSlope: number;
  hotThreshold: number;
  hotSlope: number;
  powerBurnThreshold: number;
  powerBurnSlope: number;
  windDroughtThreshold: number;  // anomaly below this adds to the bull signal
  windDroughtSlope: number;
  windSurplusThreshold: number;  // anomaly above this subtracts
  windSurplusSlope: number;
  minConfidence: number;
  strongCutoff: number;
  cutoff: number;
}

export interface DisagreementSettings {
  spreadScale: number;  // spread (degree days) that maps to a volatility of 100
  maxVolatility: number;
}

export interface WindSettings {
  droughtSpeedMs: number;
  kmhToMs: number;
  bullishBelow: number;
  bearishAbove: number;
}

export interface FreezeOffBasin {
  name: string;
  bounds: RegionBounds;
  thresholdF: number;
  mmcfdPerDegBelow: number;
}

export interface SeasonWindow {
  startMonth: number;
  startDay: number;
  endMonth: number;
  endDay: number;
}

export interface EngineConfig {
  baseTempF: number;
  region: RegionBounds;
  gridResolution: number;
  kernelSigma: KernelSigma;
  summerMonths: readonly number[];
  signalThreshold: number;
  minRunDays: number;
  streakArrowCap: number;
  families: ModelFamilies;
  modelInference: readonly ModelInferenceRule[];
  fallbackModel: string;
  disagreement: DisagreementSettings;
  composite: CompositeSettings;
  wind: WindSettings;
  gwMonthlyScale: Readonly<Record<number, number>>;
  freezeOffBasins: readonly FreezeOffBasin[];
  heatingSeason: SeasonWindow;
}

type NestedKeys = 'region' | 'kernelSigma' | 'families' | 'disagreement' | 'composite' | 'wind' | 'heatingSeason';

export type EngineConfigOverrides = Partial<Omit<EngineConfig, NestedKeys>> & {
  region?: Partial<RegionBounds>;
  kernelSigma?: Partial<KernelSigma>;
  families?: Partial<ModelFamilies>;
  disagreement?: Partial<DisagreementSettings>;
  composite?: Partial<CompositeSettings>;
  wind?: Partial<WindSettings>;
  heatingSeason?: Partial<SeasonWindow>;
};

/**
 * Defaults for the CONUS gas-demand engine.
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  baseTempF: 65,
  region: { latMin: 25.0, latMax: 50.0, lonMin: 235.0, lonMax: 295.0 },
  gridResolution: 0.25,
  kernelSigma: { lat: 2.5, lon: 3.0 },
  summerMonths: [6, 7, 8],
  signalThreshold: 0.5,
  minRunDays: 10,
  streakArrowCap: 5,
  families: {
    physics: ['ECMWF', 'ECMWF_HRES', 'GFS', 'GFS_HRES', 'NAM', 'ICON'],
    ai: ['ECMWF_AIFS', 'AIFS', 'GRAPHCAST', 'PANGUWEATHER'],
  },
  // Order matters: AIFS paths also contain "ecmwf"
  modelInference: [
    { pattern: 'aifs', model: 'ECMWF_AIFS' },
    { pattern: 'ecmwf', model: 'ECMWF' },
    { pattern: 'gfs', model: 'GFS' },
  ],
  fallbackModel: 'OPEN_METEO',
  disagreement: {
    spreadScale: 5.0,
    maxVolatility: 100,
  },
  composite: {
    coldThreshold: 25,
    coldSlope: 0.05,
    hotThreshold: 12,
    hotSlope: 0.08,
    powerBurnThreshold: 10,
    powerBurnSlope: 0.1,
    windDroughtThreshold: -1.0,
    windDroughtSlope: 0.15,
    windSurplusThreshold: 1.5,
    windSurplusSlope: 0.10,
    minConfidence: 0.2,
    strongCutoff: 0.5,
    cutoff: 0.1,
  },
  wind: {
    droughtSpeedMs: 6.0,
    kmhToMs: 0.277778,
    bullishBelow: -1.5,
    bearishAbove: 2.0,
  },
  // GW normal / simple normal, per month (EIA monthly residential consumption shape)
  gwMonthlyScale: {
    1: 1.18, 2: 1.16, 3: 1.10, 4: 1.06, 5: 1.03, 6: 1.00,
    7: 1.00, 8: 1.00, 9: 1.02, 10: 1.06, 11: 1.12, 12: 1.16,
  },
  freezeOffBasins: [
    { name: 'Permian', bounds: { latMin: 30.0, latMax: 33.0, lonMin: 254.0, lonMax: 258.0 }, thresholdF: 28.0, mmcfdPerDegBelow: 120 },
    { name: 'Anadarko', bounds: { latMin: 34.0, latMax: 37.0, lonMin: 258.0, lonMax: 262.0 }, thresholdF: 25.0, mmcfdPerDegBelow: 80 },
    { name: 'Appalachia', bounds: { latMin: 38.0, latMax: 42.0, lonMin: 278.0, lonMax: 282.0 }, thresholdF: 15.0, mmcfdPerDegBelow: 50 },
    { name: 'Bakken', bounds: { latMin: 47.0, latMax: 49.0, lonMin: 255.0, lonMax: 258.0 }, thresholdF: -5.0, mmcfdPerDegBelow: 30 },
  ],
  heatingSeason: { startMonth: 11, startDay: 1, endMonth: 3, endDay: 31 },
};

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
    Object.freeze(value);
  }
  return value;
}

// An override key set to undefined keeps its default
function definedValues<V>(overrides: { [key: string]: V | undefined } = {}): { [key: string]: V } {
  const result: { [key: string]: V } = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/**
 * Build an immutable engine configuration from the defaults plus overrides.
 * Nested sections merge key by key; arrays replace the default arrays.
 */
export function createEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const base = DEFAULT_ENGINE_CONFIG;
  const { region, kernelSigma, families, disagreement, composite, wind, heatingSeason, ...flat } = overrides;

  const merged: EngineConfig = {
    ...base,
    ...definedValues(flat),
    region: { ...base.region, ...definedValues(region) },
    kernelSigma: { ...base.kernelSigma, ...definedValues(kernelSigma) },
    families: { ...base.families, ...definedValues(families) },
    disagreement: { ...base.disagreement, ...definedValues(disagreement) },
    composite: { ...base.composite, ...definedValues(composite) },
    wind: { ...base.wind, ...definedValues(wind) },
    heatingSeason: { ...base.heatingSeason, ...definedValues(heatingSeason) },
  };

  return deepFreeze(structuredClone(merged));
}

export interface AppConfig {
  dataDir: string;
  outputDir: string;
  port: number;
  apiToken: string;
  nodeEnv: string;
  schedulerEnabled: boolean;
  pipelineCron: string;
  freezeOffModel: string;
  seasonModel: string;
  asOf: string | undefined;  // unset: the current UTC date at each run
  engine: EngineConfig;
}

function getEnvVar(name: string, defaultValue?: string): string {
  const value = process.env[name] || defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function getEnvNumber(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const num = parseFloat(value);
  if (isNaN(num)) {
    throw new Error(`Environment variable ${name} must be a number`);
  }
  return num;
}

function getEnvBool(name: string, defaultValue: boolean): boolean {
  const value = process.env[name];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvDate(name: string): string | undefined {
  const value = process.env[name];
  if (!value) return undefined;
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || !DateTime.fromISO(value, { zone: 'utc' }).isValid) {
    throw new Error(`Environment variable ${name} must be a YYYY-MM-DD date`);
  }
  return value;
}

export function loadConfig(): AppConfig {
  return {
    dataDir: path.resolve(getEnvVar('DATA_DIR', path.join(process.cwd(), 'data'))),
    outputDir: path.resolve(getEnvVar('OUTPUT_DIR', path.join(process.cwd(), 'outputs'))),
    port: getEnvNumber('PORT', 3000),
    apiToken: getEnvVar('API_TOKEN', ''),
    nodeEnv: getEnvVar('NODE_ENV', 'development'),
    schedulerEnabled: getEnvBool('SCHEDULER_ENABLED', true),
    // Shortly after the 00/06/12/18z cycles land
    pipelineCron: getEnvVar('PIPELINE_CRON', '15 */6 * * *'),
    freezeOffModel: getEnvVar('FREEZE_OFF_MODEL', 'GFS'),
    seasonModel: getEnvVar('SEASON_MODEL', 'ECMWF'),
    asOf: getEnvDate('AS_OF_DATE'),
    engine: createEngineConfig({
      baseTempF: getEnvNumber('BASE_TEMP_F', DEFAULT_ENGINE_CONFIG.baseTempF),
    }),
  };
}
