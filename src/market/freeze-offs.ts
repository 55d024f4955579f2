import type { EngineConfig } from '../config';
import type { FieldAggregator } from '../field/aggregator';
import { utcDate } from '../field/daily';
import type { FieldRun } from '../field/reader';
import type { FreezeOffRecord } from '../types';
import { round } from '../utils/numeric';
import { createLogger } from '../utils/logger';

const logger = createLogger('FreezeOffEstimator');

/**
 * Production lost to wellhead freeze-offs, from the coldest cell of each
 * basin box per day.
 */
export class FreezeOffEstimator {
  constructor(
    private config: Pick<EngineConfig, 'freezeOffBasins'>,
    private aggregator: FieldAggregator
  ) {}

  estimate(run: FieldRun): FreezeOffRecord[] {
    const basins = this.config.freezeOffBasins;
    const minima = new Map<string, Map<string, number>>();

    for (const step of run.steps) {
      const date = utcDate(step.validTime);
      if (!date) continue;
      const day = minima.get(date) ?? new Map<string, number>();
      for (const basin of basins) {
        const min = this.aggregator.cropMinimum(step.field, basin.bounds);
        if (min === null) continue;
        const current = day.get(basin.name);
        if (current === undefined || min < current) day.set(basin.name, min);
      }
      minima.set(date, day);
    }

    const records = [...minima.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, day]) => {
        const result: FreezeOffRecord['basins'] = {};
        let total = 0;
        for (const basin of basins) {
          const raw = day.get(basin.name);
          if (raw === undefined) {
            result[basin.name] = { minTempF: null, loss: 0 };
            continue;
          }
          const minTempF = round(raw, 1);
          const loss = minTempF < basin.thresholdF ? Math.round((basin.thresholdF - minTempF) * basin.mmcfdPerDegBelow) : 0;
          result[basin.name] = { minTempF, loss };
          total += loss;
        }
        return { date, basins: result, totalLossMmcfd: total };
      });

    const worst = records.reduce<FreezeOffRecord | null>((acc, r) => (!acc || r.totalLossMmcfd > acc.totalLossMmcfd ? r : acc), null);
    if (worst && worst.totalLossMmcfd > 0) {
      logger.info(`${run.model} ${run.runId}: peak freeze-off ${worst.totalLossMmcfd} MMcf/d on ${worst.date}`);
    }
    return records;
  }
}
