import type { RegionBounds } from './config';

// Weight grid types
export interface Anchor {
  id: string;
  lat: number;
  lon: number;          // 0-360
  demand: number;       // e.g. residential+commercial gas use (Bcf)
  sensitivity: number;  // e.g. 30-year heating degree days
}

export interface WeightGridMeta extends RegionBounds {
  resolution: number;
  nLats: number;
  nLons: number;
  convention: 'lon in 0-360';
  weightFormula: string;
  sigmaLat: number;
  sigmaLon: number;
  anchorCount: number;
  anchorsHash: string;
  note: string;
}

export interface WeightGrid {
  lats: readonly number[];
  lons: readonly number[];
  values: readonly (readonly number[])[];  // [latIndex][lonIndex]
  meta: WeightGridMeta;
}

// Temperature field types
export type TemperatureUnit = 'K' | 'C' | 'F';

export interface FieldPoint {
  lat: number;
  lon: number;
}

export type TemperatureField =
  | { kind: 'scalar'; unit: TemperatureUnit; value: number }
  | { kind: 'grid'; unit: TemperatureUnit; lats: readonly number[]; lons: readonly number[]; values: readonly (readonly number[])[] }
  | { kind: 'points'; unit: TemperatureUnit; points: readonly FieldPoint[]; values: readonly number[] };

export interface FieldAggregate {
  meanTemp: number;          // °F
  meanTempGw: number;        // °F
  weighted: boolean;         // false when meanTempGw fell back to meanTemp
  cells: number;
}

// Ledger types
export interface DailyRecord {
  date: string;              // YYYY-MM-DD
  model: string;
  runId: string;             // sorts chronologically, e.g. 20250121_00
  meanTemp: number;
  tdd: number;
  meanTempGw: number;
  tddGw: number;
  weighted: boolean;         // false when gw columns were backfilled from simple ones
}

export type ItemOutcome =
  | { item: string; status: 'succeeded' }
  | { item: string; status: 'skipped'; reason: string };

// Normals
export interface Normal {
  month: number;
  day: number;
  hddNormal: number;
  cddNormal: number;
  meanTempF: number;
  hddNormalGw: number | null;
  cddNormalGw: number | null;
}

export type Season = 'heating' | 'cooling';

export type Signal = 'BULLISH' | 'BEARISH' | 'NEUTRAL';

export interface AnomalyRecord extends DailyRecord {
  month: number;
  day: number;
  hddNormal: number | null;
  cddNormal: number | null;
  hddNormalGw: number | null;
  normalMeanTempF: number | null;
  forecastCdd: number;
  hddAnomaly: number | null;
  cddAnomaly: number | null;
  hddAnomalyGw: number | null;
  season: Season;
  anomaly: number | null;
}

export interface RunSummary {
  model: string;
  runId: string;
  forecastHddAvg: number;
  normalHddAvg: number | null;
  forecastCddAvg: number;
  normalCddAvg: number | null;
  forecastHddAvgGw: number;
  normalHddAvgGw: number | null;
  days: number;
  vsNormalHdd: number | null;
  vsNormalCdd: number | null;
  vsNormalHddGw: number | null;
  vsNormal: number | null;
  signal: Signal | null;
  shortRun: boolean;
}

// Run deltas
export interface DayDelta {
  date: string;
  valueLatest: number;
  valuePrev: number;
  valueChange: number;
  valueLatestGw: number;
  valuePrevGw: number;
  valueChangeGw: number;
}

export type RunDeltaResult =
  | { kind: 'delta'; model: string; runLatest: string; runPrev: string; rows: DayDelta[]; meanChange: number; meanChangeGw: number }
  | { kind: 'no_overlap'; model: string; runLatest: string; runPrev: string }
  | { kind: 'first_run'; model: string; runLatest: string | null };

export interface RunTotal {
  model: string;
  runId: string;
  days: number;
  total: number;
  totalGw: number;
  mean: number;
  meanGw: number;
  change: number | null;
  changeGw: number | null;
}

export type RevisionDirection = 'bullish' | 'bearish' | 'flat';

export type RevisionStreak =
  | { kind: 'first_run'; model: string; label: string }
  | {
      kind: 'streak';
      model: string;
      runLatest: string;
      latestChange: number;
      direction: RevisionDirection;
      count: number;
      ordinal: string;
      arrows: string;
      label: string;
    };

export interface ShiftTableRow {
  date: string;
  changes: Record<string, number | null>;
}

// Market logic
export interface DisagreementRecord {
  date: string;
  physicsMean: number | null;
  aiMean: number | null;
  spread: number;            // ai - physics, 0 when a family is missing
  disagreement: number;      // |spread|
  volatilityScore: number;   // 0-100
  models: Record<string, number>;
}

export interface PowerBurnRecord {
  date: string;
  powerBurnCdd: number;
  hubs: number;
}

export type WindImpact = 'BULLISH (Wind Drought)' | 'BEARISH (High Wind)' | 'NEUTRAL';

export interface WindAnomalyRecord {
  date: string;
  windSpeedMs: number;
  windAnomaly: number;
  gasBurnImpact: WindImpact;
  hubs: number;
}

export interface FreezeOffRecord {
  date: string;
  basins: Record<string, { minTempF: number | null; loss: number }>;
  totalLossMmcfd: number;
}

export type MarketBias = 'STRONG BULL' | 'BULLISH' | 'NEUTRAL' | 'BEARISH' | 'STRONG BEAR';

export interface CompositeSignal {
  date: string;
  masterValue: number | null;
  disagreementSpread: number;
  powerBurnProxy: number | null;
  windAnomaly: number | null;
  confidence: number;
  compositeScore: number;
  marketBias: MarketBias;
}

export interface SeasonPoint {
  date: string;
  forecastHdd: number;
  normalHdd: number | null;
  cumulativeForecast: number;
  cumulativeNormal: number;
  cumulativeDeparture: number;
}

// Pipeline bookkeeping
export type StageStatus = 'succeeded' | 'skipped' | 'failed';

export interface StageOutcome {
  stage: string;
  status: StageStatus;
  detail: string;
  durationMs: number;
}

export interface PipelineRunRecord {
  id: string;
  startedAt: string;
  finishedAt: string;
  status: 'succeeded' | 'failed';
  records: number;
  stages: StageOutcome[];
  error: string | null;
}

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
}
