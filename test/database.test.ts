import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createEngineConfig } from '../src/config';
import { LedgerDatabase } from '../src/db/database';
import { ConfigurationError } from '../src/errors';
import { RunStore } from '../src/ledger/run-store';
import type { PipelineRunRecord } from '../src/types';
import { makeTempDir, record, removeDir } from './fixtures';

const pipelineRun = (id: string, startedAt: string): PipelineRunRecord => ({
  id,
  startedAt,
  finishedAt: startedAt,
  status: 'succeeded',
  records: 3,
  stages: [{ stage: 'ingest', status: 'succeeded', detail: '3 records', durationMs: 4 }],
  error: null,
});

describe('LedgerDatabase', () => {
  let db: LedgerDatabase;

  beforeEach(() => {
    db = new LedgerDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('upserts records by model, run and date', () => {
    db.upsertRecords([record({ date: '2025-01-15', tdd: 30 }), record({ date: '2025-01-16', tdd: 32 })]);
    db.upsertRecords([record({ date: '2025-01-15', tdd: 31 })]);

    expect(db.countRecords()).toBe(2);
    const store = new RunStore(createEngineConfig());
    store.ingest([db.loadBatch()]);
    expect(store.records().map(r => [r.date, r.tdd])).toEqual([
      ['2025-01-15', 31],
      ['2025-01-16', 32],
    ]);
  });

  it('restores the weighted flag from its integer column', () => {
    db.upsertRecords([record({ date: '2025-01-15', tdd: 30, weighted: false })]);
    const store = new RunStore(createEngineConfig());
    store.ingest([db.loadBatch()]);
    expect(store.records()[0].weighted).toBe(false);
  });

  it('lists the distinct runs', () => {
    db.upsertRecords([
      record({ date: '2025-01-15', tdd: 30, runId: '20250115_00' }),
      record({ date: '2025-01-16', tdd: 30, runId: '20250115_00' }),
      record({ date: '2025-01-15', tdd: 30, runId: '20250114_12' }),
      record({ date: '2025-01-15', tdd: 30, model: 'GFS' }),
    ]);
    expect(db.getRuns()).toEqual([
      { model: 'ECMWF', runId: '20250114_12' },
      { model: 'ECMWF', runId: '20250115_00' },
      { model: 'GFS', runId: '20250115_00' },
    ]);
  });

  it('pins the base temperature on first use', () => {
    db.assertBaseTemp(65);
    expect(db.getState('base_temp_f')).toBe('65');
    expect(() => db.assertBaseTemp(65)).not.toThrow();
    expect(() => db.assertBaseTemp(60)).toThrow(ConfigurationError);
  });

  it('stores key/value state', () => {
    expect(db.getState('missing')).toBeNull();
    db.setState('k', 'a');
    db.setState('k', 'b');
    expect(db.getState('k')).toBe('b');
  });

  it('keeps pipeline history newest first', () => {
    db.recordPipelineRun(pipelineRun('a', '2025-01-15T00:00:00.000Z'));
    db.recordPipelineRun(pipelineRun('b', '2025-01-15T06:00:00.000Z'));

    expect(db.getRecentPipelineRuns().map(r => r.id)).toEqual(['b', 'a']);
    expect(db.getLastPipelineRun()).toEqual(pipelineRun('b', '2025-01-15T06:00:00.000Z'));
  });

  it('has no last run before anything is recorded', () => {
    expect(db.getLastPipelineRun()).toBeNull();
  });
});

describe('LedgerDatabase on disk', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('persists records across connections', () => {
    const file = path.join(dir, 'nested', 'ledger.db');
    const first = new LedgerDatabase(file);
    first.upsertRecords([record({ date: '2025-01-15', tdd: 30 })]);
    first.close();

    const second = new LedgerDatabase(file);
    expect(second.countRecords()).toBe(1);
    second.close();
  });
});
