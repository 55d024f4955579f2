import type { Server } from 'http';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createServer } from '../src/api/server';
import { createEngineConfig } from '../src/config';
import { LedgerDatabase } from '../src/db/database';
import { Pipeline } from '../src/pipeline';
import { PipelineScheduler } from '../src/scheduler';
import { makeTempDir, removeDir, writeDataDir } from './fixtures';

const TOKEN = 'test-secret';

describe('API server', () => {
  let dir: string;
  let db: LedgerDatabase;
  let server: Server;
  let baseUrl: string;

  async function start(options: { normalsBaseTemp?: number } = {}): Promise<void> {
    writeDataDir(path.join(dir, 'data'), options);
    const ledgerFile = path.join(dir, 'ledger.db');
    db = new LedgerDatabase(ledgerFile);
    const pipeline = new Pipeline(createEngineConfig(), {
      dataDir: path.join(dir, 'data'),
      outputDir: path.join(dir, 'outputs'),
      freezeOffModel: 'GFS',
      seasonModel: 'ECMWF',
      ledgerFile,
      asOf: '2025-01-15',
    });
    const app = createServer({ apiToken: TOKEN }, db, new PipelineScheduler(pipeline));

    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  function get(route: string, token: string | null = TOKEN): Promise<Response> {
    return fetch(`${baseUrl}${route}`, { headers: token ? { Authorization: `Bearer ${token}` } : {} });
  }

  function post(route: string): Promise<Response> {
    return fetch(`${baseUrl}${route}`, { method: 'POST', headers: { Authorization: `Bearer ${TOKEN}` } });
  }

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    db.close();
    removeDir(dir);
  });

  it('serves the health check without a token', async () => {
    await start();
    const res = await get('/health', null);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('rejects API calls without the token', async () => {
    await start();
    const res = await get('/api/status', null);
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ success: false, error: 'Unauthorized' });

    const wrong = await get('/api/status', 'other');
    expect(wrong.status).toBe(401);
  });

  it('accepts the token as a query parameter', async () => {
    await start();
    const res = await get(`/api/status?token=${TOKEN}`, null);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      data: { records: 0, lastRun: null, scheduler: { isRunning: false, schedulerActive: false } },
    });
  });

  it('reports that no run has completed yet', async () => {
    await start();
    const res = await get('/api/summary');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ success: false, error: 'No pipeline run has completed yet' });
  });

  it('runs the pipeline on request and serves its results', async () => {
    await start();
    const run = await post('/api/pipeline/run');
    expect(run.status).toBe(200);
    expect(await run.json()).toMatchObject({ success: true, data: { records: 8, outputs: 13 } });

    const streaks = await get('/api/streaks?model=ecmwf');
    expect(await streaks.json()).toEqual({
      success: true,
      data: [
        {
          kind: 'streak',
          model: 'ECMWF',
          runLatest: '20250115_00',
          latestChange: 39,
          direction: 'bullish',
          count: 1,
          ordinal: '1st',
          arrows: '↑',
          label: '1st consecutive bullish revision',
        },
      ],
    });

    const runs = await get('/api/runs');
    expect(await runs.json()).toEqual({
      success: true,
      data: [
        { model: 'ECMWF', runId: '20250114_00' },
        { model: 'ECMWF', runId: '20250115_00' },
        { model: 'ECMWF_AIFS', runId: '20250115_00' },
        { model: 'GFS', runId: '20250115_00' },
      ],
    });

    const history = await get('/api/pipeline/history?limit=5');
    expect(await history.json()).toMatchObject({ success: true, data: [{ status: 'succeeded', records: 8 }] });

    await post('/api/pipeline/run');
    const clamped = await get('/api/pipeline/history?limit=-1');
    const clampedBody: { data: unknown[] } = await clamped.json();
    expect(clampedBody.data).toHaveLength(1);

    const status = await get('/api/status');
    expect(await status.json()).toMatchObject({ success: true, data: { records: 8, lastRun: { status: 'succeeded' } } });
  });

  it('reports a failed run', async () => {
    await start({ normalsBaseTemp: 60 });
    const res = await post('/api/pipeline/run');
    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({ success: false });
  });

  it('returns 404 for unknown API routes', async () => {
    await start();
    const res = await get('/api/unknown');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ success: false, error: 'Not found' });
  });
});
