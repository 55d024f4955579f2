import fs from 'fs';
import { z } from 'zod';
import type { EngineConfig } from '../config';
import { DegreeDayComputer, toFahrenheit } from '../degree-day';
import { ConfigurationError, MissingInputError } from '../errors';
import { readJsonFile } from '../io/files';
import type { PowerBurnRecord, WindAnomalyRecord, WindImpact } from '../types';
import { round } from '../utils/numeric';
import { createLogger } from '../utils/logger';

const logger = createLogger('DemandProxies');

const HubSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  lat: z.number(),
  lon: z.number(),
  weight: z.number().positive(),
});

const HubTableSchema = z.object({
  description: z.string().optional(),
  hubs: z.array(HubSchema).min(1),
});

export type Hub = z.infer<typeof HubSchema>;

const SampleSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  value: z.number().finite().nullable(),
});

const SeriesSchema = z.object({
  hub: z.string().min(1),
  samples: z.array(SampleSchema),
});

export const TemperatureSeriesFileSchema = z.object({
  unit: z.enum(['K', 'C', 'F']),
  series: z.array(SeriesSchema),
});

export const WindSeriesFileSchema = z.object({
  unit: z.enum(['km/h', 'm/s']),
  series: z.array(SeriesSchema),
});

export type PointSeries = z.infer<typeof SeriesSchema>;
export type TemperatureSeriesFile = z.infer<typeof TemperatureSeriesFileSchema>;
export type WindSeriesFile = z.infer<typeof WindSeriesFileSchema>;

export function loadHubs(file: string): Hub[] {
  if (!fs.existsSync(file)) {
    throw new MissingInputError(`Hub table not found: ${file}`, file);
  }
  const parsed = HubTableSchema.safeParse(readJsonFile(file));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid hub table ${file}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }
  return parsed.data.hubs;
}

/**
 * Read and validate a point-series file. A missing file is a MissingInputError.
 */
export function readSeriesFile<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  if (!fs.existsSync(file)) {
    throw new MissingInputError(`Point series not found: ${file}`, file);
  }
  const parsed = schema.safeParse(readJsonFile(file));
  if (!parsed.success) {
    throw new Error(`Invalid point series ${file}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }
  return parsed.data;
}

interface WeightedAccumulator {
  sum: number;
  weight: number;
  hubs: number;
}

/**
 * Hub-weighted mean per date. Unknown hubs and null samples are skipped.
 */
function weightedByDate(
  hubs: readonly Hub[],
  series: readonly PointSeries[],
  transform: (value: number) => number,
  label: string
): Map<string, WeightedAccumulator> {
  const weights = new Map(hubs.map(h => [h.id, h.weight]));
  const byDate = new Map<string, WeightedAccumulator>();
  const unknown: string[] = [];

  for (const s of series) {
    const weight = weights.get(s.hub);
    if (weight === undefined) {
      unknown.push(s.hub);
      continue;
    }
    for (const sample of s.samples) {
      if (sample.value === null) continue;
      const acc = byDate.get(sample.date) ?? { sum: 0, weight: 0, hubs: 0 };
      acc.sum += transform(sample.value) * weight;
      acc.weight += weight;
      acc.hubs++;
      byDate.set(sample.date, acc);
    }
  }

  if (unknown.length > 0) {
    logger.warn(`${label}: skipped ${unknown.length} series for unknown hubs: ${unknown.join(', ')}`);
  }
  return byDate;
}

/**
 * Weather-driven gas burn proxies: power-burn cooling demand and wind output.
 */
export class DemandProxies {
  private degreeDays: DegreeDayComputer;

  constructor(private config: Pick<EngineConfig, 'baseTempF' | 'wind'>) {
    this.degreeDays = new DegreeDayComputer(config);
  }

  powerBurn(hubs: readonly Hub[], file: TemperatureSeriesFile): PowerBurnRecord[] {
    const byDate = weightedByDate(
      hubs,
      file.series,
      value => this.degreeDays.cooling(toFahrenheit(value, file.unit)),
      'power burn'
    );
    return [...byDate.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, acc]) => ({ date, powerBurnCdd: round(acc.sum / acc.weight, 2), hubs: acc.hubs }));
  }

  windImpact(anomaly: number): WindImpact {
    if (anomaly < this.config.wind.bullishBelow) return 'BULLISH (Wind Drought)';
    if (anomaly > this.config.wind.bearishAbove) return 'BEARISH (High Wind)';
    return 'NEUTRAL';
  }

  wind(hubs: readonly Hub[], file: WindSeriesFile): WindAnomalyRecord[] {
    const { kmhToMs, droughtSpeedMs } = this.config.wind;
    const toMs = file.unit === 'km/h' ? (v: number) => v * kmhToMs : (v: number) => v;
    const byDate = weightedByDate(hubs, file.series, toMs, 'wind');

    return [...byDate.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, acc]) => {
        const speed = acc.sum / acc.weight;
        const anomaly = round(speed - droughtSpeedMs, 2);
        return {
          date,
          windSpeedMs: round(speed, 2),
          windAnomaly: anomaly,
          gasBurnImpact: this.windImpact(anomaly),
          hubs: acc.hubs,
        };
      });
  }
}
