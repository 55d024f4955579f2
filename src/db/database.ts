import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../errors';
import type { RecordBatch } from '../ledger/run-store';
import type { DailyRecord, PipelineRunRecord } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('LedgerDatabase');

export const LEDGER_FILE = 'ledger.db';
const BASE_TEMP_KEY = 'base_temp_f';

const StateRowSchema = z.object({ value: z.string() });
const CountRowSchema = z.object({ count: z.number() });
const RunIdRowSchema = z.object({ model: z.string(), run_id: z.string() });

const StageOutcomeSchema = z.object({
  stage: z.string(),
  status: z.enum(['succeeded', 'skipped', 'failed']),
  detail: z.string(),
  durationMs: z.number(),
});

const PipelineRunRowSchema = z.object({
  id: z.string(),
  started_at: z.string(),
  finished_at: z.string(),
  status: z.enum(['succeeded', 'failed']),
  records: z.number(),
  stages: z.string().transform(text => z.array(StageOutcomeSchema).parse(JSON.parse(text))),
  error: z.string().nullable(),
});

/**
 * SQLite persistence for the daily-record ledger and pipeline history.
 * Pass ':memory:' for a throwaway database.
 */
export class LedgerDatabase {
  private db: Database.Database;

  constructor(file: string) {
    if (file !== ':memory:') {
      const dir = path.dirname(file);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    logger.info(`Opening ledger at: ${file}`);
    this.db = new Database(file);
    this.db.pragma('journal_mode = WAL');
    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS daily_records (
        model TEXT NOT NULL,
        run_id TEXT NOT NULL,
        date TEXT NOT NULL,
        mean_temp REAL NOT NULL,
        tdd REAL NOT NULL,
        mean_temp_gw REAL NOT NULL,
        tdd_gw REAL NOT NULL,
        weighted INTEGER NOT NULL DEFAULT 1,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (model, run_id, date)
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_daily_records_date ON daily_records(date);
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ledger_state (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS pipeline_runs (
        id TEXT PRIMARY KEY,
        started_at TEXT NOT NULL,
        finished_at TEXT NOT NULL,
        status TEXT NOT NULL,
        records INTEGER NOT NULL,
        stages TEXT NOT NULL,
        error TEXT
      )
    `);

    logger.debug('Ledger tables initialized');
  }

  /**
   * Records the base temperature on first use; afterwards a different value
   * is a ConfigurationError.
   */
  assertBaseTemp(baseTempF: number): void {
    const stored = this.getState(BASE_TEMP_KEY);
    if (stored === null) {
      this.setState(BASE_TEMP_KEY, String(baseTempF));
      return;
    }
    if (Number(stored) !== baseTempF) {
      throw new ConfigurationError(
        `Ledger was built with base ${stored}°F but the engine is configured for ${baseTempF}°F`
      );
    }
  }

  // Daily records
  upsertRecords(records: readonly DailyRecord[]): number {
    const stmt = this.db.prepare(`
      INSERT INTO daily_records (
        model, run_id, date, mean_temp, tdd, mean_temp_gw, tdd_gw, weighted, updated_at
      ) VALUES (
        @model, @run_id, @date, @mean_temp, @tdd, @mean_temp_gw, @tdd_gw, @weighted, @updated_at
      )
      ON CONFLICT(model, run_id, date) DO UPDATE SET
        mean_temp = excluded.mean_temp,
        tdd = excluded.tdd,
        mean_temp_gw = excluded.mean_temp_gw,
        tdd_gw = excluded.tdd_gw,
        weighted = excluded.weighted,
        updated_at = excluded.updated_at
    `);
    const now = new Date().toISOString();
    const write = this.db.transaction((rows: readonly DailyRecord[]) => {
      for (const r of rows) {
        stmt.run({
          model: r.model,
          run_id: r.runId,
          date: r.date,
          mean_temp: r.meanTemp,
          tdd: r.tdd,
          mean_temp_gw: r.meanTempGw,
          tdd_gw: r.tddGw,
          weighted: r.weighted ? 1 : 0,
          updated_at: now,
        });
      }
    });
    write(records);
    logger.debug(`Upserted ${records.length} daily records`);
    return records.length;
  }

  /**
   * All stored rows as a batch for RunStore ingestion.
   */
  loadBatch(): RecordBatch {
    const rows = this.db
      .prepare(`
        SELECT date, model, run_id, mean_temp, tdd, mean_temp_gw, tdd_gw, weighted
        FROM daily_records
        ORDER BY model, run_id, date
      `)
      .all();
    return { source: LEDGER_FILE, rows };
  }

  countRecords(): number {
    const row = CountRowSchema.parse(this.db.prepare('SELECT COUNT(*) as count FROM daily_records').get());
    return row.count;
  }

  getRuns(): { model: string; runId: string }[] {
    const rows = this.db
      .prepare('SELECT DISTINCT model, run_id FROM daily_records ORDER BY model, run_id')
      .all();
    return z.array(RunIdRowSchema).parse(rows).map(r => ({ model: r.model, runId: r.run_id }));
  }

  // Ledger state operations
  setState(key: string, value: string): void {
    const stmt = this.db.prepare(`
      INSERT INTO ledger_state (key, value, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET value = ?, updated_at = ?
    `);
    const now = new Date().toISOString();
    stmt.run(key, value, now, value, now);
  }

  getState(key: string): string | null {
    const result = StateRowSchema.safeParse(this.db.prepare('SELECT value FROM ledger_state WHERE key = ?').get(key));
    return result.success ? result.data.value : null;
  }

  // Pipeline history
  recordPipelineRun(run: PipelineRunRecord): void {
    const stmt = this.db.prepare(`
      INSERT INTO pipeline_runs (id, started_at, finished_at, status, records, stages, error)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    stmt.run(run.id, run.startedAt, run.finishedAt, run.status, run.records, JSON.stringify(run.stages), run.error);
  }

  getRecentPipelineRuns(limit: number = 20): PipelineRunRecord[] {
    const rows = this.db.prepare('SELECT * FROM pipeline_runs ORDER BY started_at DESC LIMIT ?').all(limit);
    return z.array(PipelineRunRowSchema).parse(rows).map(r => ({
      id: r.id,
      startedAt: r.started_at,
      finishedAt: r.finished_at,
      status: r.status,
      records: r.records,
      stages: r.stages,
      error: r.error,
    }));
  }

  getLastPipelineRun(): PipelineRunRecord | null {
    const [last] = this.getRecentPipelineRuns(1);
    return last ?? null;
  }

  close(): void {
    this.db.close();
    logger.info('Ledger closed');
  }
}
