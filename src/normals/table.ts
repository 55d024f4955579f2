import fs from 'fs';
import path from 'path';
import { DateTime } from 'luxon';
import { z } from 'zod';
import type { EngineConfig } from '../config';
import { DegreeDayComputer } from '../degree-day';
import { ConfigurationError, MissingInputError } from '../errors';
import { numberCell, optionalNumberCell, readCsv } from '../io/csv';
import type { Normal } from '../types';
import { round } from '../utils/numeric';
import { createLogger } from '../utils/logger';

const logger = createLogger('NormalsTable');

export const NORMALS_FILE = 'us_daily_normals.csv';
export const GW_NORMALS_FILE = 'us_gas_weighted_normals.csv';

const monthCell = numberCell.pipe(z.number().int().min(1).max(12));
const dayCell = numberCell.pipe(z.number().int().min(1).max(31));

export const NormalRowSchema = z.object({
  month: monthCell,
  day: dayCell,
  hdd_normal: numberCell.pipe(z.number().nonnegative()),
  cdd_normal: numberCell.pipe(z.number().nonnegative()),
  mean_temp_f: numberCell,
  hdd_normal_gw: optionalNumberCell,
  cdd_normal_gw: optionalNumberCell,
  base_temp_f: optionalNumberCell,
});

const GwNormalRowSchema = z.object({
  month: monthCell,
  day: dayCell,
  hdd_normal_gw: numberCell,
  cdd_normal_gw: optionalNumberCell,
});

function dayKey(month: number, day: number): string {
  return `${month}-${day}`;
}

/**
 * Gas-weighted normals from simple ones, scaled per month. CDD normals are
 * carried over unscaled.
 */
export function buildGasWeightedNormals(
  normals: readonly Normal[],
  monthlyScale: Readonly<Record<number, number>>
): Normal[] {
  return normals.map(n => ({
    ...n,
    hddNormalGw: round(n.hddNormal * (monthlyScale[n.month] ?? 1.0), 1),
    cddNormalGw: n.cddNormal,
  }));
}

/**
 * 30-year daily normals keyed by (month, day).
 */
export class NormalsTable {
  private byDay = new Map<string, Normal>();

  constructor(normals: readonly Normal[]) {
    for (const normal of normals) {
      this.byDay.set(dayKey(normal.month, normal.day), normal);
    }
  }

  get size(): number {
    return this.byDay.size;
  }

  /**
   * Feb 29 falls back to Feb 28, then Mar 1.
   */
  lookup(month: number, day: number): Normal | null {
    const exact = this.byDay.get(dayKey(month, day));
    if (exact) return exact;
    if (month === 2 && day === 29) {
      return this.byDay.get(dayKey(2, 28)) ?? this.byDay.get(dayKey(3, 1)) ?? null;
    }
    return null;
  }

  lookupDate(date: string): Normal | null {
    const parsed = DateTime.fromISO(date, { zone: 'utc' });
    if (!parsed.isValid) return null;
    return this.lookup(parsed.month, parsed.day);
  }

  /**
   * Load the normals table (and the optional gas-weighted companion) from a
   * directory. Without any gas-weighted columns they are derived from the
   * monthly scale factors.
   */
  static load(dir: string, config: Pick<EngineConfig, 'baseTempF' | 'gwMonthlyScale'>): NormalsTable {
    const file = path.join(dir, NORMALS_FILE);
    if (!fs.existsSync(file)) {
      throw new MissingInputError(`Normals table not found: ${file}`, file);
    }

    const degreeDays = new DegreeDayComputer(config);
    let normals: Normal[] = [];
    let invalid = 0;

    for (const raw of readCsv(file)) {
      const parsed = NormalRowSchema.safeParse(raw);
      if (!parsed.success) {
        invalid++;
        continue;
      }
      const row = parsed.data;
      if (row.base_temp_f !== undefined) {
        degreeDays.assertBaseTemp(row.base_temp_f, file);
      }
      normals.push({
        month: row.month,
        day: row.day,
        hddNormal: row.hdd_normal,
        cddNormal: row.cdd_normal,
        meanTempF: row.mean_temp_f,
        hddNormalGw: row.hdd_normal_gw ?? null,
        cddNormalGw: row.cdd_normal_gw ?? null,
      });
    }

    if (normals.length === 0) {
      throw new ConfigurationError(`Normals table ${file} has no valid rows`);
    }
    if (invalid > 0) {
      logger.warn(`${file}: ${invalid} rows failed validation`);
    }

    const gwFile = path.join(dir, GW_NORMALS_FILE);
    if (fs.existsSync(gwFile)) {
      const gw = new Map<string, { hdd: number; cdd: number | null }>();
      let invalidGw = 0;
      for (const raw of readCsv(gwFile)) {
        const parsed = GwNormalRowSchema.safeParse(raw);
        if (!parsed.success) {
          invalidGw++;
          continue;
        }
        gw.set(dayKey(parsed.data.month, parsed.data.day), {
          hdd: parsed.data.hdd_normal_gw,
          cdd: parsed.data.cdd_normal_gw ?? null,
        });
      }
      if (invalidGw > 0) {
        logger.warn(`${gwFile}: ${invalidGw} rows failed validation`);
      }
      normals = normals.map(n => {
        const match = gw.get(dayKey(n.month, n.day));
        return match ? { ...n, hddNormalGw: match.hdd, cddNormalGw: match.cdd ?? n.cddNormal } : n;
      });
      logger.debug(`Merged ${gw.size} gas-weighted normals from ${gwFile}`);
    }

    if (!normals.some(n => n.hddNormalGw !== null)) {
      logger.info('Normals carry no gas-weighted columns; deriving them from monthly scale factors');
      normals = buildGasWeightedNormals(normals, config.gwMonthlyScale);
    }

    logger.info(`Loaded ${normals.length} daily normals`);
    return new NormalsTable(normals);
  }
}
