import type { EngineConfig } from '../config';
import type { RunStore } from '../ledger/run-store';
import type { DisagreementRecord } from '../types';
import { mean, round, roundOrNull } from '../utils/numeric';
import { createLogger } from '../utils/logger';

const logger = createLogger('DisagreementAnalyzer');

export type ModelFamily = 'physics' | 'ai';

/**
 * Physics vs AI consensus per forecast date, from the latest run of every
 * model. A wide spread marks a low-confidence forecast.
 */
export class DisagreementAnalyzer {
  constructor(
    private config: Pick<EngineConfig, 'families' | 'disagreement'>,
    private store: RunStore
  ) {}

  familyOf(model: string): ModelFamily | null {
    const upper = model.toUpperCase();
    if (this.config.families.physics.includes(upper)) return 'physics';
    if (this.config.families.ai.includes(upper)) return 'ai';
    return null;
  }

  volatility(disagreement: number): number {
    const { spreadScale, maxVolatility } = this.config.disagreement;
    return round(Math.min((disagreement / spreadScale) * 100, maxVolatility), 1);
  }

  /**
   * @param asOf - only dates on or after this YYYY-MM-DD date
   */
  analyze(asOf?: string): DisagreementRecord[] {
    const byDate = new Map<string, Record<string, number>>();
    for (const model of this.store.models()) {
      for (const record of this.store.latestRecords(model)) {
        if (asOf && record.date < asOf) continue;
        const models = byDate.get(record.date) ?? {};
        models[model] = record.tdd;
        byDate.set(record.date, models);
      }
    }

    const records = [...byDate.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, models]) => {
        const physics: number[] = [];
        const ai: number[] = [];
        for (const [model, tdd] of Object.entries(models)) {
          const family = this.familyOf(model);
          if (family === 'physics') physics.push(tdd);
          else if (family === 'ai') ai.push(tdd);
        }

        const physicsMean = mean(physics);
        const aiMean = mean(ai);
        const spread = physicsMean !== null && aiMean !== null ? aiMean - physicsMean : 0;
        const disagreement = Math.abs(spread);

        const record: DisagreementRecord = {
          date,
          physicsMean: roundOrNull(physicsMean, 2),
          aiMean: roundOrNull(aiMean, 2),
          spread: round(spread, 2),
          disagreement: round(disagreement, 2),
          volatilityScore: this.volatility(disagreement),
          models,
        };
        return record;
      });

    const peak = records.reduce<DisagreementRecord | null>((acc, r) => (!acc || r.disagreement > acc.disagreement ? r : acc), null);
    if (peak && peak.disagreement > 0) {
      logger.info(`Peak physics/AI disagreement ${peak.disagreement} HDD on ${peak.date} (volatility ${peak.volatilityScore})`);
    } else if (records.length > 0) {
      logger.warn('Physics or AI family missing; disagreement is zero for every date');
    }
    return records;
  }
}
