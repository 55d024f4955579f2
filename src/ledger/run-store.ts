import path from 'path';
import { DateTime } from 'luxon';
import { z } from 'zod';
import type { EngineConfig } from '../config';
import { MissingInputError } from '../errors';
import { readCsv } from '../io/csv';
import type { CsvColumns } from '../io/csv';
import { numberCell, optionalBooleanCell, optionalNumberCell, optionalStringCell } from '../io/csv';
import { listFiles } from '../io/files';
import type { DailyRecord } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('RunStore');

export const DailyRecordRowSchema = z.object({
  date: z.string().refine(v => DateTime.fromISO(v, { zone: 'utc' }).isValid && /^\d{4}-\d{2}-\d{2}$/.test(v), {
    message: 'date must be YYYY-MM-DD',
  }),
  model: optionalStringCell,
  run_id: z.preprocess(v => (typeof v === 'number' ? String(v) : v), z.string().trim().min(1)),
  mean_temp: numberCell,
  tdd: numberCell.pipe(z.number().nonnegative()),
  mean_temp_gw: optionalNumberCell,
  tdd_gw: optionalNumberCell.pipe(z.number().nonnegative().optional()),
  weighted: optionalBooleanCell,
});

export type DailyRecordRow = z.infer<typeof DailyRecordRowSchema>;

/**
 * A set of raw rows from one source. Rows are validated on ingest.
 */
export interface RecordBatch {
  source: string;
  model?: string;
  rows: readonly unknown[];
}

export interface IngestReport {
  sources: number;
  rowsRead: number;
  invalidRows: number;
  duplicatesDropped: number;
  records: number;
  models: string[];
}

export const DAILY_RECORD_COLUMNS: CsvColumns<DailyRecord> = [
  ['date', r => r.date],
  ['mean_temp', r => r.meanTemp],
  ['tdd', r => r.tdd],
  ['mean_temp_gw', r => r.meanTempGw],
  ['tdd_gw', r => r.tddGw],
  ['model', r => r.model],
  ['run_id', r => r.runId],
  ['weighted', r => r.weighted],
];

export function recordToRow(record: DailyRecord): DailyRecordRow {
  return {
    date: record.date,
    model: record.model,
    run_id: record.runId,
    mean_temp: record.meanTemp,
    tdd: record.tdd,
    mean_temp_gw: record.meanTempGw,
    tdd_gw: record.tddGw,
    weighted: record.weighted,
  };
}

/**
 * Model label for a source path, by case-insensitive substring. Rules are
 * tried in order so that more specific labels win.
 */
export function inferModel(source: string, config: Pick<EngineConfig, 'modelInference' | 'fallbackModel'>): string {
  const haystack = source.toLowerCase();
  const rule = config.modelInference.find(r => haystack.includes(r.pattern.toLowerCase()));
  return rule ? rule.model : config.fallbackModel;
}

function recordKey(model: string, runId: string, date: string): string {
  return `${model}\u0000${runId}\u0000${date}`;
}

/**
 * Code-point order, so the latest run is the same for every caller
 * regardless of locale.
 */
export function compareRunIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareRecords(a: DailyRecord, b: DailyRecord): number {
  return compareRunIds(a.model, b.model) || compareRunIds(a.runId, b.runId) || compareRunIds(a.date, b.date);
}

/**
 * Read every `*_tdd.csv` table under a directory as one batch per file.
 */
export function readTddDirectory(dir: string): RecordBatch[] {
  const files = listFiles(dir, '_tdd.csv');
  if (files.length === 0) {
    throw new MissingInputError(`No *_tdd.csv tables under ${dir}`, dir);
  }
  return files.map(file => ({ source: path.relative(dir, file), rows: readCsv(file) }));
}

/**
 * In-memory ledger of daily records keyed by (model, runId, date). Later rows
 * replace earlier ones with the same key.
 */
export class RunStore {
  private byKey = new Map<string, DailyRecord>();
  private sorted: DailyRecord[] | null = null;

  constructor(private config: Pick<EngineConfig, 'modelInference' | 'fallbackModel'>) {}

  get size(): number {
    return this.byKey.size;
  }

  ingest(batches: readonly RecordBatch[]): IngestReport {
    let rowsRead = 0;
    let invalidRows = 0;
    let accepted = 0;
    const before = this.byKey.size;

    for (const batch of batches) {
      const batchModel = batch.model ?? inferModel(batch.source, this.config);
      let batchInvalid = 0;

      for (const raw of batch.rows) {
        rowsRead++;
        const parsed = DailyRecordRowSchema.safeParse(raw);
        if (!parsed.success) {
          batchInvalid++;
          continue;
        }
        const record = this.toRecord(parsed.data, batchModel);
        this.byKey.set(recordKey(record.model, record.runId, record.date), record);
        accepted++;
      }

      if (batchInvalid > 0) {
        invalidRows += batchInvalid;
        logger.warn(`${batch.source} (${batchModel}): ${batchInvalid} of ${batch.rows.length} rows failed validation`);
      }
    }

    this.sorted = null;
    const added = this.byKey.size - before;
    const report: IngestReport = {
      sources: batches.length,
      rowsRead,
      invalidRows,
      duplicatesDropped: accepted - added,
      records: this.byKey.size,
      models: this.models(),
    };
    logger.info(`Ingested ${rowsRead} rows from ${batches.length} sources`, report);
    return report;
  }

  records(): readonly DailyRecord[] {
    if (!this.sorted) {
      this.sorted = [...this.byKey.values()].sort(compareRecords);
    }
    return this.sorted;
  }

  models(): string[] {
    return [...new Set(this.records().map(r => r.model))];
  }

  runIds(model: string): string[] {
    return [...new Set(this.records().filter(r => r.model === model).map(r => r.runId))];
  }

  latestRun(model: string): string | null {
    const runs = this.runIds(model);
    return runs.length > 0 ? runs[runs.length - 1] : null;
  }

  recordsFor(model: string, runId: string): DailyRecord[] {
    return this.records().filter(r => r.model === model && r.runId === runId);
  }

  latestRecords(model: string): DailyRecord[] {
    const runId = this.latestRun(model);
    return runId ? this.recordsFor(model, runId) : [];
  }

  private toRecord(row: DailyRecordRow, batchModel: string): DailyRecord {
    const hasGw = row.mean_temp_gw !== undefined && row.tdd_gw !== undefined;
    return {
      date: row.date,
      model: row.model ?? batchModel,
      runId: row.run_id,
      meanTemp: row.mean_temp,
      tdd: row.tdd,
      meanTempGw: row.mean_temp_gw ?? row.mean_temp,
      tddGw: row.tdd_gw ?? row.tdd,
      weighted: hasGw && (row.weighted ?? true),
    };
  }
}
