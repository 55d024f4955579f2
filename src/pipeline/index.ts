import path from 'path';
import { DateTime } from 'luxon';
import { v4 as uuidv4 } from 'uuid';
import type { EngineConfig } from '../config';
import { LEDGER_FILE, LedgerDatabase } from '../db/database';
import { FieldAggregator } from '../field/aggregator';
import { DailyRecordBuilder } from '../field/daily';
import { readFieldDirectory } from '../field/reader';
import type { FieldRun } from '../field/reader';
import { ConfigurationError, MissingInputError, errorMessage } from '../errors';
import { writeCsv } from '../io/csv';
import type { CsvColumns } from '../io/csv';
import { DAILY_RECORD_COLUMNS, RunStore, compareRunIds, readTddDirectory, recordToRow } from '../ledger/run-store';
import type { IngestReport, RecordBatch } from '../ledger/run-store';
import { CompositeScorer } from '../market/composite';
import { DisagreementAnalyzer } from '../market/disagreement';
import { FreezeOffEstimator } from '../market/freeze-offs';
import { DemandProxies, TemperatureSeriesFileSchema, WindSeriesFileSchema, loadHubs, readSeriesFile } from '../market/proxies';
import { NormalComparator } from '../normals/comparator';
import { SeasonTracker } from '../normals/season';
import { NormalsTable } from '../normals/table';
import { RunDeltaTracker } from '../runs/delta-tracker';
import type {
  AnomalyRecord,
  CompositeSignal,
  DisagreementRecord,
  FreezeOffRecord,
  ItemOutcome,
  PipelineRunRecord,
  PowerBurnRecord,
  RevisionStreak,
  RunDeltaResult,
  RunSummary,
  RunTotal,
  SeasonPoint,
  ShiftTableRow,
  StageOutcome,
  WeightGrid,
  WindAnomalyRecord,
} from '../types';
import { createLogger } from '../utils/logger';
import { WeightGridStore, loadAnchors } from '../weights/store';
import {
  ANOMALY_COLUMNS,
  COMPOSITE_COLUMNS,
  POWER_BURN_COLUMNS,
  RUN_CHANGE_COLUMNS,
  RUN_DELTA_COLUMNS,
  RUN_SUMMARY_COLUMNS,
  SEASON_COLUMNS,
  WIND_COLUMNS,
  disagreementColumns,
  freezeOffColumns,
  shiftTableColumns,
} from './tables';
import type { DeltaRow } from './tables';

const logger = createLogger('Pipeline');

export interface PipelineOptions {
  dataDir: string;
  outputDir: string;
  freezeOffModel: string;
  seasonModel: string;
  // Defaults to <dataDir>/ledger.db; ':memory:' keeps nothing between runs
  ledgerFile?: string;
  // Only forecast dates on or after this date feed the disagreement index;
  // defaults to the current UTC date at each run
  asOf?: string;
}

export interface PipelineResult {
  id: string;
  startedAt: string;
  finishedAt: string;
  stages: StageOutcome[];
  ingest: IngestReport | null;
  // Per-step outcomes of every field run aggregated into daily records
  fieldSteps: ItemOutcome[];
  anomalies: AnomalyRecord[];
  summaries: RunSummary[];
  deltas: RunDeltaResult[];
  runTotals: RunTotal[];
  streaks: RevisionStreak[];
  shiftTable: ShiftTableRow[];
  disagreement: DisagreementRecord[];
  powerBurn: PowerBurnRecord[];
  wind: WindAnomalyRecord[];
  freezeOffs: FreezeOffRecord[];
  season: SeasonPoint[];
  composite: CompositeSignal[];
  outputs: string[];
}

function emptyResult(id: string, startedAt: string): PipelineResult {
  return {
    id,
    startedAt,
    finishedAt: startedAt,
    stages: [],
    ingest: null,
    fieldSteps: [],
    anomalies: [],
    summaries: [],
    deltas: [],
    runTotals: [],
    streaks: [],
    shiftTable: [],
    disagreement: [],
    powerBurn: [],
    wind: [],
    freezeOffs: [],
    season: [],
    composite: [],
    outputs: [],
  };
}

export function latestFieldRun(runs: readonly FieldRun[], model: string): FieldRun | null {
  return runs
    .filter(r => r.model === model)
    .reduce<FieldRun | null>((latest, r) => (!latest || compareRunIds(r.runId, latest.runId) > 0 ? r : latest), null);
}

/**
 * One end-to-end invocation: weights, daily records, ledger, normals, run
 * deltas and market signals. Stages whose inputs are missing are skipped;
 * a ConfigurationError fails the whole invocation.
 */
export class Pipeline {
  private store: RunStore;
  private result: PipelineResult;
  private fieldRuns: FieldRun[] = [];
  private weights: WeightGrid | null = null;

  constructor(
    private config: EngineConfig,
    private options: PipelineOptions
  ) {
    this.store = new RunStore(config);
    this.result = emptyResult('', '');
  }

  run(): PipelineResult {
    const startedAt = new Date().toISOString();
    this.result = emptyResult(uuidv4(), startedAt);
    this.store = new RunStore(this.config);
    this.fieldRuns = [];
    this.weights = null;

    logger.info(`=== PIPELINE ${this.result.id} STARTING ===`);
    const ledger = new LedgerDatabase(this.options.ledgerFile ?? path.join(this.options.dataDir, LEDGER_FILE));
    let failure: unknown = null;

    try {
      ledger.assertBaseTemp(this.config.baseTempF);

      this.stage('weights', () => this.buildWeights());
      this.stage('fields', () => this.readFields());
      this.stage('ingest', () => this.ingest(ledger));
      this.stage('normals', () => this.compareNormals());
      this.stage('season', () => this.trackSeason());
      this.stage('run-deltas', () => this.computeDeltas());
      this.stage('disagreement', () => this.computeDisagreement());
      this.stage('power-burn', () => this.computePowerBurn());
      this.stage('wind', () => this.computeWind());
      this.stage('freeze-offs', () => this.computeFreezeOffs());
      this.stage('composite', () => this.computeComposite());
    } catch (error) {
      failure = error;
    }

    this.result.finishedAt = new Date().toISOString();
    const record: PipelineRunRecord = {
      id: this.result.id,
      startedAt,
      finishedAt: this.result.finishedAt,
      status: failure === null ? 'succeeded' : 'failed',
      records: this.store.size,
      stages: this.result.stages,
      error: failure === null ? null : errorMessage(failure),
    };
    ledger.recordPipelineRun(record);
    ledger.close();

    if (failure !== null) {
      logger.error(`=== PIPELINE ${this.result.id} FAILED ===`, failure);
      throw failure;
    }

    const skipped = this.result.stages.filter(s => s.status !== 'succeeded');
    logger.info(
      `=== PIPELINE ${this.result.id} COMPLETE: ${this.store.size} records, ` +
        `${this.result.outputs.length} tables, ${skipped.length} stages skipped or failed ===`
    );
    return this.result;
  }

  private stage(name: string, fn: () => string): void {
    const started = Date.now();
    const stageLogger = logger.child(name);
    const finish = (status: StageOutcome['status'], detail: string) => {
      this.result.stages.push({ stage: name, status, detail, durationMs: Date.now() - started });
    };

    try {
      const detail = fn();
      finish('succeeded', detail);
      stageLogger.debug(detail);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        finish('failed', error.message);
        throw error;
      }
      if (error instanceof MissingInputError) {
        stageLogger.warn(`Skipped: ${error.message}`);
        finish('skipped', error.message);
        return;
      }
      stageLogger.error('Failed', error);
      finish('failed', errorMessage(error));
    }
  }

  private output<T>(file: string, rows: readonly T[], columns: CsvColumns<T>): void {
    const target = path.join(this.options.outputDir, file);
    writeCsv(target, rows, columns);
    this.result.outputs.push(target);
  }

  private requireRecords(): void {
    if (this.store.size === 0) {
      throw new MissingInputError('No daily records in the ledger');
    }
  }

  private buildWeights(): string {
    const anchors = loadAnchors(path.join(this.options.dataDir, 'anchors.json'));
    const store = new WeightGridStore(path.join(this.options.dataDir, 'weights'), this.config);
    this.weights = store.loadOrBuild(anchors);
    return `${this.weights.meta.nLats} × ${this.weights.meta.nLons} grid from ${anchors.length} anchors`;
  }

  private readFields(): string {
    const { runs, outcomes } = readFieldDirectory(path.join(this.options.dataDir, 'fields'));
    if (runs.length === 0 && outcomes.length === 0) {
      throw new MissingInputError(`No field files under ${path.join(this.options.dataDir, 'fields')}`);
    }
    this.fieldRuns = runs;
    const failed = outcomes.filter(o => o.status === 'skipped').length;
    return `${runs.length} field runs read, ${failed} files skipped`;
  }

  private ingest(ledger: LedgerDatabase): string {
    const batches: RecordBatch[] = [ledger.loadBatch()];

    try {
      batches.push(...readTddDirectory(path.join(this.options.dataDir, 'tdd')));
    } catch (error) {
      if (!(error instanceof MissingInputError)) throw error;
      logger.debug(error.message);
    }

    const aggregator = new FieldAggregator(this.config, this.weights);
    const builder = new DailyRecordBuilder(this.config, aggregator);
    for (const run of this.fieldRuns) {
      const { records, outcomes } = builder.build(run);
      this.result.fieldSteps.push(...outcomes);
      batches.push({ source: run.source, model: run.model, rows: records.map(recordToRow) });
    }

    const report = this.store.ingest(batches);
    this.result.ingest = report;
    this.requireRecords();

    ledger.upsertRecords(this.store.records());
    this.output('tdd_master.csv', this.store.records(), DAILY_RECORD_COLUMNS);
    for (const model of this.store.models()) {
      this.output(`${model.toLowerCase()}_latest.csv`, this.store.latestRecords(model), DAILY_RECORD_COLUMNS);
    }

    const skippedSteps = this.result.fieldSteps.filter(o => o.status === 'skipped').length;
    return (
      `${report.records} records (${report.invalidRows} invalid, ${report.duplicatesDropped} duplicates) for ${report.models.join(', ')}; ` +
      `${skippedSteps} of ${this.result.fieldSteps.length} field steps skipped`
    );
  }

  private loadNormals(): NormalsTable {
    return NormalsTable.load(path.join(this.options.dataDir, 'normals'), this.config);
  }

  private compareNormals(): string {
    this.requireRecords();
    const comparator = new NormalComparator(this.config, this.loadNormals());
    this.result.anomalies = comparator.compare(this.store.records());
    this.result.summaries = comparator.summarize(this.result.anomalies);

    this.output('vs_normal.csv', this.result.anomalies, ANOMALY_COLUMNS);
    this.output('run_summary.csv', this.result.summaries, RUN_SUMMARY_COLUMNS);

    for (const s of this.result.summaries) {
      logger.info(
        `${s.model} ${s.runId} | HDD ${s.forecastHddAvg} (normal ${s.normalHddAvg ?? 'n/a'}) | GW ${s.forecastHddAvgGw} | → ${s.signal ?? 'NO NORMAL'}`
      );
    }
    return `${this.result.summaries.length} run summaries`;
  }

  private trackSeason(): string {
    this.requireRecords();
    const records = this.store.latestRecords(this.options.seasonModel);
    if (records.length === 0) {
      throw new MissingInputError(`No ${this.options.seasonModel} records for the season tracker`);
    }
    const tracker = new SeasonTracker(this.config, this.loadNormals());
    this.result.season = tracker.track(records);
    this.output('cumulative_season.csv', this.result.season, SEASON_COLUMNS);
    return `${this.result.season.length} heating-season days`;
  }

  private computeDeltas(): string {
    this.requireRecords();
    const tracker = new RunDeltaTracker(this.config, this.store);
    const deltaRows: DeltaRow[] = [];

    for (const model of this.store.models()) {
      const delta = tracker.dayAligned(model);
      this.result.deltas.push(delta);
      if (delta.kind === 'delta') {
        for (const row of delta.rows) {
          deltaRows.push({ ...row, model, runLatest: delta.runLatest, runPrev: delta.runPrev });
        }
      }
      this.result.runTotals.push(...tracker.runAligned(model));

      const streak = tracker.streak(model);
      this.result.streaks.push(streak);
      logger.info(`${model}: ${streak.kind === 'streak' ? `${streak.arrows} ${streak.label}` : streak.label}`);
    }
    this.result.shiftTable = tracker.shiftTable();

    this.output('run_delta.csv', deltaRows, RUN_DELTA_COLUMNS);
    this.output('run_change.csv', this.result.runTotals, RUN_CHANGE_COLUMNS);
    this.output('model_shift_table.csv', this.result.shiftTable, shiftTableColumns(this.result.shiftTable));

    const compared = this.result.deltas.filter(d => d.kind === 'delta').length;
    return `${compared} of ${this.result.deltas.length} models compared against their previous run`;
  }

  private computeDisagreement(): string {
    this.requireRecords();
    const asOf = this.options.asOf ?? DateTime.utc().toISODate() ?? undefined;
    const analyzer = new DisagreementAnalyzer(this.config, this.store);
    this.result.disagreement = analyzer.analyze(asOf);
    this.output('physics_vs_ai_disagreement.csv', this.result.disagreement, disagreementColumns(this.result.disagreement));
    return `${this.result.disagreement.length} dates from ${asOf ?? 'the first forecast date'}`;
  }

  private computePowerBurn(): string {
    const hubs = loadHubs(path.join(this.options.dataDir, 'power-burn-hubs.json'));
    const series = readSeriesFile(path.join(this.options.dataDir, 'proxies', 'power_burn.json'), TemperatureSeriesFileSchema);
    this.result.powerBurn = new DemandProxies(this.config).powerBurn(hubs, series);
    this.output('power_burn_cdd_proxy.csv', this.result.powerBurn, POWER_BURN_COLUMNS);
    return `${this.result.powerBurn.length} dates from ${hubs.length} hubs`;
  }

  private computeWind(): string {
    const hubs = loadHubs(path.join(this.options.dataDir, 'wind-hubs.json'));
    const series = readSeriesFile(path.join(this.options.dataDir, 'proxies', 'wind.json'), WindSeriesFileSchema);
    this.result.wind = new DemandProxies(this.config).wind(hubs, series);
    this.output('wind_generation_anomaly_proxy.csv', this.result.wind, WIND_COLUMNS);
    return `${this.result.wind.length} dates from ${hubs.length} hubs`;
  }

  private computeFreezeOffs(): string {
    const run = latestFieldRun(this.fieldRuns, this.options.freezeOffModel);
    if (!run) {
      throw new MissingInputError(`No ${this.options.freezeOffModel} field run for freeze-off estimates`);
    }
    const estimator = new FreezeOffEstimator(this.config, new FieldAggregator(this.config));
    this.result.freezeOffs = estimator.estimate(run);
    const basins = this.config.freezeOffBasins.map(b => b.name);
    this.output('freeze_off_forecast.csv', this.result.freezeOffs, freezeOffColumns(basins));
    return `${this.result.freezeOffs.length} dates from ${run.model} ${run.runId}`;
  }

  private computeComposite(): string {
    if (this.result.disagreement.length === 0 && this.result.powerBurn.length === 0) {
      throw new MissingInputError('Neither disagreement nor power-burn inputs are available');
    }
    const scorer = new CompositeScorer(this.config);
    this.result.composite = scorer.combine(this.result.disagreement, this.result.powerBurn, this.result.wind);
    this.output('composite_bull_bear_signal.csv', this.result.composite, COMPOSITE_COLUMNS);

    const latest = this.result.composite[this.result.composite.length - 1];
    if (latest) {
      logger.info(`Composite ${latest.date}: ${latest.compositeScore} (${latest.marketBias})`);
    }
    return `${this.result.composite.length} dates`;
  }
}
