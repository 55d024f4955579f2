import { DateTime } from 'luxon';
import type { EngineConfig, SeasonWindow } from '../config';
import type { DailyRecord, SeasonPoint } from '../types';
import { round } from '../utils/numeric';
import type { NormalsTable } from './table';

/**
 * Whether a date falls inside a month/day window. Windows may wrap the year
 * end (e.g. Nov 1 - Mar 31).
 */
export function inSeason(date: string, window: SeasonWindow): boolean {
  const d = DateTime.fromISO(date, { zone: 'utc' });
  if (!d.isValid) return false;
  const key = d.month * 100 + d.day;
  const start = window.startMonth * 100 + window.startDay;
  const end = window.endMonth * 100 + window.endDay;
  return start <= end ? key >= start && key <= end : key >= start || key <= end;
}

/**
 * Cumulative forecast HDD against cumulative normal HDD across the heating
 * season, over forecast dates only.
 */
export class SeasonTracker {
  constructor(
    private config: Pick<EngineConfig, 'heatingSeason'>,
    private normals: NormalsTable
  ) {}

  track(records: readonly DailyRecord[]): SeasonPoint[] {
    const inWindow = records
      .filter(r => inSeason(r.date, this.config.heatingSeason))
      .sort((a, b) => a.date.localeCompare(b.date));

    let cumulativeForecast = 0;
    let cumulativeNormal = 0;

    return inWindow.map(record => {
      const normal = this.normals.lookupDate(record.date);
      cumulativeForecast += record.tddGw;
      if (normal) cumulativeNormal += normal.hddNormal;
      return {
        date: record.date,
        forecastHdd: record.tddGw,
        normalHdd: normal ? normal.hddNormal : null,
        cumulativeForecast: round(cumulativeForecast, 1),
        cumulativeNormal: round(cumulativeNormal, 1),
        cumulativeDeparture: round(cumulativeForecast - cumulativeNormal, 1),
      };
    });
  }
}
