import { DateTime } from 'luxon';
import type { EngineConfig } from '../config';
import { DegreeDayComputer } from '../degree-day';
import { EmptyFieldError, errorMessage } from '../errors';
import type { DailyRecord, ItemOutcome } from '../types';
import { round } from '../utils/numeric';
import { createLogger } from '../utils/logger';
import type { FieldAggregator } from './aggregator';
import type { FieldRun } from './reader';

const logger = createLogger('DailyRecordBuilder');

interface DayBucket {
  temps: number[];
  tempsGw: number[];
  weighted: boolean;
}

/**
 * UTC calendar date (YYYY-MM-DD) of an ISO valid time, or null when the
 * timestamp cannot be parsed.
 */
export function utcDate(validTime: string): string | null {
  const parsed = DateTime.fromISO(validTime, { zone: 'utc' });
  return parsed.isValid ? parsed.toISODate() : null;
}

/**
 * Reduces a field run to one DailyRecord per UTC date.
 */
export class DailyRecordBuilder {
  private degreeDays: DegreeDayComputer;

  constructor(
    config: Pick<EngineConfig, 'baseTempF'>,
    private aggregator: FieldAggregator
  ) {
    this.degreeDays = new DegreeDayComputer(config);
  }

  build(run: FieldRun): { records: DailyRecord[]; outcomes: ItemOutcome[] } {
    const outcomes: ItemOutcome[] = [...run.outcomes];
    const buckets = new Map<string, DayBucket>();

    for (const step of run.steps) {
      const date = utcDate(step.validTime);
      if (!date) {
        outcomes.push({ item: step.validTime, status: 'skipped', reason: 'unparseable valid time' });
        continue;
      }

      try {
        const aggregate = this.aggregator.aggregate(step.field);
        const bucket = buckets.get(date) ?? { temps: [], tempsGw: [], weighted: true };
        bucket.temps.push(aggregate.meanTemp);
        bucket.tempsGw.push(aggregate.meanTempGw);
        bucket.weighted = bucket.weighted && aggregate.weighted;
        buckets.set(date, bucket);
        outcomes.push({ item: step.validTime, status: 'succeeded' });
      } catch (error) {
        if (!(error instanceof EmptyFieldError)) throw error;
        outcomes.push({ item: step.validTime, status: 'skipped', reason: errorMessage(error) });
      }
    }

    const records: DailyRecord[] = [...buckets.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, bucket]) => {
        const meanTemp = bucket.temps.reduce((acc, t) => acc + t, 0) / bucket.temps.length;
        const meanTempGw = bucket.tempsGw.reduce((acc, t) => acc + t, 0) / bucket.tempsGw.length;
        return {
          date,
          model: run.model,
          runId: run.runId,
          meanTemp: round(meanTemp, 2),
          tdd: this.degreeDays.heating(meanTemp),
          meanTempGw: round(meanTempGw, 2),
          tddGw: this.degreeDays.heating(meanTempGw),
          weighted: bucket.weighted,
        };
      });

    const skipped = outcomes.filter(o => o.status === 'skipped').length;
    if (skipped > 0) {
      logger.warn(`${run.model} ${run.runId}: skipped ${skipped} of ${run.steps.length + run.outcomes.length} steps`);
    }
    logger.debug(`${run.model} ${run.runId}: ${records.length} daily records from ${run.steps.length} steps`);

    return { records, outcomes };
  }
}
