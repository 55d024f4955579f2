import { DateTime } from 'luxon';
import type { EngineConfig } from '../config';
import { DegreeDayComputer } from '../degree-day';
import type { AnomalyRecord, DailyRecord, RunSummary, Signal } from '../types';
import { mean, round, roundOrNull } from '../utils/numeric';
import { createLogger } from '../utils/logger';
import type { NormalsTable } from './table';

const logger = createLogger('NormalComparator');

type ComparatorConfig = Pick<EngineConfig, 'baseTempF' | 'summerMonths' | 'signalThreshold' | 'minRunDays'>;

function diff(a: number | null, b: number | null, decimals: number): number | null {
  return a === null || b === null ? null : round(a - b, decimals);
}

function meanOf<T>(rows: readonly T[], pick: (row: T) => number | null): number | null {
  const values: number[] = [];
  for (const row of rows) {
    const v = pick(row);
    if (v !== null) values.push(v);
  }
  return mean(values);
}

/**
 * Joins daily records to climatological normals and summarises each run.
 */
export class NormalComparator {
  private degreeDays: DegreeDayComputer;

  constructor(
    private config: ComparatorConfig,
    private normals: NormalsTable
  ) {
    this.degreeDays = new DegreeDayComputer(config);
  }

  signalFor(value: number): Signal {
    if (value > this.config.signalThreshold) return 'BULLISH';
    if (value < -this.config.signalThreshold) return 'BEARISH';
    return 'NEUTRAL';
  }

  compare(records: readonly DailyRecord[]): AnomalyRecord[] {
    let unmatched = 0;

    const rows = records.map(record => {
      const date = DateTime.fromISO(record.date, { zone: 'utc' });
      const month = date.month;
      const day = date.day;
      const normal = this.normals.lookup(month, day);
      if (!normal) unmatched++;

      const forecastCdd = this.degreeDays.cooling(record.meanTemp);
      const hddAnomaly = normal ? round(record.tdd - normal.hddNormal, 1) : null;
      const cddAnomaly = normal ? round(forecastCdd - normal.cddNormal, 1) : null;
      const hddAnomalyGw = diff(record.tddGw, normal?.hddNormalGw ?? null, 1);
      const season = this.config.summerMonths.includes(month) ? 'cooling' : 'heating';

      const anomalyRecord: AnomalyRecord = {
        ...record,
        month,
        day,
        hddNormal: normal?.hddNormal ?? null,
        cddNormal: normal?.cddNormal ?? null,
        hddNormalGw: normal?.hddNormalGw ?? null,
        normalMeanTempF: normal?.meanTempF ?? null,
        forecastCdd,
        hddAnomaly,
        cddAnomaly,
        hddAnomalyGw,
        season,
        anomaly: season === 'cooling' ? cddAnomaly : hddAnomaly,
      };
      return anomalyRecord;
    });

    if (unmatched > 0) {
      logger.warn(`${unmatched} of ${records.length} records have no matching normal`);
    }
    return rows;
  }

  /**
   * One summary per (model, runId), in input order.
   */
  summarize(rows: readonly AnomalyRecord[]): RunSummary[] {
    const groups = new Map<string, AnomalyRecord[]>();
    for (const row of rows) {
      const key = `${row.model}\u0000${row.runId}`;
      const group = groups.get(key);
      if (group) group.push(row);
      else groups.set(key, [row]);
    }

    const summaries: RunSummary[] = [];
    for (const group of groups.values()) {
      const { model, runId } = group[0];
      const forecastHddAvg = meanOf(group, r => r.tdd) ?? 0;
      const forecastCddAvg = meanOf(group, r => r.forecastCdd) ?? 0;
      const forecastHddAvgGw = meanOf(group, r => r.tddGw) ?? 0;
      const normalHddAvg = meanOf(group, r => r.hddNormal);
      const normalCddAvg = meanOf(group, r => r.cddNormal);
      const normalHddAvgGw = meanOf(group, r => r.hddNormalGw);
      const vsNormal = meanOf(group, r => r.anomaly);

      summaries.push({
        model,
        runId,
        forecastHddAvg: round(forecastHddAvg, 2),
        normalHddAvg: roundOrNull(normalHddAvg, 2),
        forecastCddAvg: round(forecastCddAvg, 2),
        normalCddAvg: roundOrNull(normalCddAvg, 2),
        forecastHddAvgGw: round(forecastHddAvgGw, 2),
        normalHddAvgGw: roundOrNull(normalHddAvgGw, 2),
        days: group.length,
        vsNormalHdd: diff(forecastHddAvg, normalHddAvg, 2),
        vsNormalCdd: diff(forecastCddAvg, normalCddAvg, 2),
        vsNormalHddGw: diff(forecastHddAvgGw, normalHddAvgGw, 2),
        vsNormal: roundOrNull(vsNormal, 2),
        signal: vsNormal === null ? null : this.signalFor(vsNormal),
        shortRun: group.length < this.config.minRunDays,
      });
    }

    const short = summaries.filter(s => s.shortRun);
    if (short.length > 0) {
      logger.warn(
        `${short.length} runs shorter than ${this.config.minRunDays} days: ` +
          short.map(s => `${s.model} ${s.runId} (${s.days}d)`).join(', ')
      );
    }
    return summaries;
  }
}
