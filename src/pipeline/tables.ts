import type { CsvColumns } from '../io/csv';
import type {
  AnomalyRecord,
  CompositeSignal,
  DayDelta,
  DisagreementRecord,
  FreezeOffRecord,
  PowerBurnRecord,
  RunSummary,
  RunTotal,
  SeasonPoint,
  ShiftTableRow,
  WindAnomalyRecord,
} from '../types';

// Column layouts of the output tables

export const ANOMALY_COLUMNS: CsvColumns<AnomalyRecord> = [
  ['date', r => r.date],
  ['model', r => r.model],
  ['run_id', r => r.runId],
  ['mean_temp', r => r.meanTemp],
  ['tdd', r => r.tdd],
  ['mean_temp_gw', r => r.meanTempGw],
  ['tdd_gw', r => r.tddGw],
  ['month', r => r.month],
  ['day', r => r.day],
  ['hdd_normal', r => r.hddNormal],
  ['cdd_normal', r => r.cddNormal],
  ['hdd_normal_gw', r => r.hddNormalGw],
  ['mean_temp_f', r => r.normalMeanTempF],
  ['forecast_cdd', r => r.forecastCdd],
  ['hdd_anomaly', r => r.hddAnomaly],
  ['cdd_anomaly', r => r.cddAnomaly],
  ['hdd_anomaly_gw', r => r.hddAnomalyGw],
  ['season', r => r.season],
  ['anomaly', r => r.anomaly],
];

export const RUN_SUMMARY_COLUMNS: CsvColumns<RunSummary> = [
  ['model', r => r.model],
  ['run_id', r => r.runId],
  ['forecast_hdd_avg', r => r.forecastHddAvg],
  ['normal_hdd_avg', r => r.normalHddAvg],
  ['forecast_cdd_avg', r => r.forecastCddAvg],
  ['normal_cdd_avg', r => r.normalCddAvg],
  ['forecast_hdd_avg_gw', r => r.forecastHddAvgGw],
  ['normal_hdd_avg_gw', r => r.normalHddAvgGw],
  ['days', r => r.days],
  ['vs_normal_hdd', r => r.vsNormalHdd],
  ['vs_normal_cdd', r => r.vsNormalCdd],
  ['vs_normal_hdd_gw', r => r.vsNormalHddGw],
  ['vs_normal', r => r.vsNormal],
  ['signal', r => r.signal],
  ['short_run', r => r.shortRun],
];

export interface DeltaRow extends DayDelta {
  model: string;
  runLatest: string;
  runPrev: string;
}

export const RUN_DELTA_COLUMNS: CsvColumns<DeltaRow> = [
  ['model', r => r.model],
  ['run_latest', r => r.runLatest],
  ['run_prev', r => r.runPrev],
  ['date', r => r.date],
  ['value_latest', r => r.valueLatest],
  ['value_prev', r => r.valuePrev],
  ['value_change', r => r.valueChange],
  ['value_latest_gw', r => r.valueLatestGw],
  ['value_prev_gw', r => r.valuePrevGw],
  ['value_change_gw', r => r.valueChangeGw],
];

export const RUN_CHANGE_COLUMNS: CsvColumns<RunTotal> = [
  ['model', r => r.model],
  ['run_id', r => r.runId],
  ['days', r => r.days],
  ['tdd', r => r.total],
  ['tdd_gw', r => r.totalGw],
  ['mean_tdd', r => r.mean],
  ['mean_tdd_gw', r => r.meanGw],
  ['hdd_change', r => r.change],
  ['hdd_change_gw', r => r.changeGw],
];

export function shiftTableColumns(rows: readonly ShiftTableRow[]): CsvColumns<ShiftTableRow> {
  const names = [...new Set(rows.flatMap(r => Object.keys(r.changes)))];
  return [['date', r => r.date], ...names.map(name => [name, (r: ShiftTableRow) => r.changes[name] ?? null] as const)];
}

export function disagreementColumns(rows: readonly DisagreementRecord[]): CsvColumns<DisagreementRecord> {
  const models = [...new Set(rows.flatMap(r => Object.keys(r.models)))].sort();
  return [
    ['date', r => r.date],
    ...models.map(model => [model, (r: DisagreementRecord) => r.models[model] ?? null] as const),
    ['physics_mean', r => r.physicsMean],
    ['ai_mean', r => r.aiMean],
    ['disagreement_hdd', r => r.spread],
    ['disagreement_abs', r => r.disagreement],
    ['volatility_risk_score', r => r.volatilityScore],
  ];
}

export const POWER_BURN_COLUMNS: CsvColumns<PowerBurnRecord> = [
  ['date', r => r.date],
  ['power_burn_cdd', r => r.powerBurnCdd],
  ['hubs', r => r.hubs],
];

export const WIND_COLUMNS: CsvColumns<WindAnomalyRecord> = [
  ['date', r => r.date],
  ['wind_speed_ms', r => r.windSpeedMs],
  ['wind_anomaly', r => r.windAnomaly],
  ['gas_burn_impact', r => r.gasBurnImpact],
  ['hubs', r => r.hubs],
];

export function freezeOffColumns(basins: readonly string[]): CsvColumns<FreezeOffRecord> {
  return [
    ['date', r => r.date],
    ...basins.flatMap(name => [
      [`${name}_min_f`, (r: FreezeOffRecord) => r.basins[name]?.minTempF ?? null] as const,
      [`${name}_loss`, (r: FreezeOffRecord) => r.basins[name]?.loss ?? 0] as const,
    ]),
    ['total_loss_mmcfd', r => r.totalLossMmcfd],
  ];
}

export const SEASON_COLUMNS: CsvColumns<SeasonPoint> = [
  ['date', r => r.date],
  ['forecast_hdd', r => r.forecastHdd],
  ['normal_hdd', r => r.normalHdd],
  ['cumulative_forecast', r => r.cumulativeForecast],
  ['cumulative_normal', r => r.cumulativeNormal],
  ['cumulative_departure', r => r.cumulativeDeparture],
];

export const COMPOSITE_COLUMNS: CsvColumns<CompositeSignal> = [
  ['date', r => r.date],
  ['master_value', r => r.masterValue],
  ['disagreement_spread', r => r.disagreementSpread],
  ['power_burn_proxy', r => r.powerBurnProxy],
  ['wind_anomaly', r => r.windAnomaly],
  ['confidence', r => r.confidence],
  ['composite_score', r => r.compositeScore],
  ['market_bias', r => r.marketBias],
];
