import type { EngineConfig } from '../config';
import type { CompositeSignal, DisagreementRecord, MarketBias, PowerBurnRecord, WindAnomalyRecord } from '../types';
import { clamp, mean, round, roundOrNull } from '../utils/numeric';

export interface CompositeInputs {
  masterValue: number | null;
  powerBurn: number | null;
  windAnomaly: number | null;
  volatilityScore: number;
}

/**
 * Bounded bull/bear score per date from model consensus, power burn and wind,
 * discounted by model disagreement.
 */
export class CompositeScorer {
  constructor(private config: Pick<EngineConfig, 'composite'>) {}

  bias(score: number): MarketBias {
    const { strongCutoff, cutoff } = this.config.composite;
    if (score > strongCutoff) return 'STRONG BULL';
    if (score > cutoff) return 'BULLISH';
    if (score < -strongCutoff) return 'STRONG BEAR';
    if (score < -cutoff) return 'BEARISH';
    return 'NEUTRAL';
  }

  confidence(volatilityScore: number): number {
    return Math.max(this.config.composite.minConfidence, 1 - volatilityScore / 100);
  }

  /**
   * Unrounded score clamped to [-1, 1].
   */
  score(inputs: CompositeInputs): number {
    const c = this.config.composite;
    let bull = 0;

    const m = inputs.masterValue ?? 0;
    if (m > c.coldThreshold) {
      bull += (m - c.coldThreshold) * c.coldSlope;
    } else if (m > c.hotThreshold) {
      bull += (m - c.hotThreshold) * c.hotSlope;
    }

    const pb = inputs.powerBurn;
    if (pb !== null && pb > c.powerBurnThreshold) {
      bull += (pb - c.powerBurnThreshold) * c.powerBurnSlope;
    }

    const w = inputs.windAnomaly;
    if (w !== null && w < c.windDroughtThreshold) {
      bull += Math.abs(w) * c.windDroughtSlope;
    } else if (w !== null && w > c.windSurplusThreshold) {
      bull -= Math.abs(w) * c.windSurplusSlope;
    }

    return clamp(bull * this.confidence(inputs.volatilityScore), -1, 1);
  }

  /**
   * Dates are the union of disagreement and power-burn dates; wind joins
   * where present.
   */
  combine(
    disagreement: readonly DisagreementRecord[],
    powerBurn: readonly PowerBurnRecord[] = [],
    wind: readonly WindAnomalyRecord[] = []
  ): CompositeSignal[] {
    const byDisagreement = new Map(disagreement.map(d => [d.date, d]));
    const byPowerBurn = new Map(powerBurn.map(p => [p.date, p.powerBurnCdd]));
    const byWind = new Map(wind.map(w => [w.date, w.windAnomaly]));
    const dates = [...new Set([...byDisagreement.keys(), ...byPowerBurn.keys()])].sort();

    return dates.map(date => {
      const d = byDisagreement.get(date);
      const familyMeans: number[] = [];
      if (d && d.physicsMean !== null) familyMeans.push(d.physicsMean);
      if (d && d.aiMean !== null) familyMeans.push(d.aiMean);

      const inputs: CompositeInputs = {
        masterValue: mean(familyMeans),
        powerBurn: byPowerBurn.get(date) ?? null,
        windAnomaly: byWind.get(date) ?? null,
        volatilityScore: d ? d.volatilityScore : 0,
      };
      const score = this.score(inputs);

      return {
        date,
        masterValue: roundOrNull(inputs.masterValue, 1),
        disagreementSpread: d ? round(d.disagreement, 1) : 0,
        powerBurnProxy: roundOrNull(inputs.powerBurn, 1),
        windAnomaly: inputs.windAnomaly,
        confidence: round(this.confidence(inputs.volatilityScore), 2),
        compositeScore: round(score, 2),
        marketBias: this.bias(score),
      };
    });
  }
}
