import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import type { AppConfig } from '../config';
import type { LedgerDatabase } from '../db/database';
import { errorMessage } from '../errors';
import type { PipelineResult } from '../pipeline';
import { PipelineBusyError } from '../scheduler';
import type { PipelineScheduler } from '../scheduler';
import type { ApiResponse } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('API');

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createServer(
  config: Pick<AppConfig, 'apiToken'>,
  db: LedgerDatabase,
  scheduler: PipelineScheduler
): express.Application {
  const app = express();
  const startTime = Date.now();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Bearer token auth for API routes; disabled when no token is configured
  const authMiddleware = (req: Request, res: Response, next: NextFunction): void => {
    if (!config.apiToken) {
      return next();
    }

    const authHeader = req.headers.authorization;
    if (authHeader) {
      const [type, credentials] = authHeader.split(' ');
      if (type === 'Bearer' && credentials === config.apiToken) {
        return next();
      }
    }

    if (req.query.token === config.apiToken) {
      return next();
    }

    res.status(401).json({ success: false, error: 'Unauthorized' });
  };

  // Apply auth to API routes
  app.use('/api', authMiddleware);

  // Serve a section of the last pipeline result, optionally filtered by model
  const fromLastResult = <T>(pick: (result: PipelineResult) => T[], modelOf?: (item: T) => string) =>
    (req: Request, res: Response<ApiResponse<T[]>>): void => {
      const result = scheduler.getLastResult();
      if (!result) {
        res.status(404).json({ success: false, error: 'No pipeline run has completed yet' });
        return;
      }
      const model = queryString(req.query.model);
      const items = pick(result);
      const data = model && modelOf ? items.filter(item => modelOf(item).toUpperCase() === model.toUpperCase()) : items;
      res.json({ success: true, data });
    };

  // Health check (no auth required)
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', uptime: Date.now() - startTime });
  });

  app.get('/api/status', (req: Request, res: Response) => {
    try {
      res.json({
        success: true,
        data: {
          scheduler: scheduler.getStatus(),
          records: db.countRecords(),
          lastRun: db.getLastPipelineRun(),
          uptime: Date.now() - startTime,
        },
      });
    } catch (error) {
      logger.error('Failed to get status', error);
      res.status(500).json({ success: false, error: 'Internal server error' });
    }
  });

  app.get('/api/runs', (req: Request, res: Response) => {
    try {
      const model = queryString(req.query.model);
      const runs = db.getRuns().filter(r => !model || r.model.toUpperCase() === model.toUpperCase());
      res.json({ success: true, data: runs });
    } catch (error) {
      logger.error('Failed to list runs', error);
      res.status(500).json({ success: false, error: 'Internal server error' });
    }
  });

  app.get('/api/pipeline/history', (req: Request, res: Response) => {
    try {
      const limit = parseInt(queryString(req.query.limit) ?? '20', 10);
      res.json({ success: true, data: db.getRecentPipelineRuns(Number.isNaN(limit) ? 20 : Math.max(1, limit)) });
    } catch (error) {
      logger.error('Failed to get pipeline history', error);
      res.status(500).json({ success: false, error: 'Internal server error' });
    }
  });

  app.get('/api/summary', fromLastResult(r => r.summaries, s => s.model));
  app.get('/api/deltas', fromLastResult(r => r.deltas, d => d.model));
  app.get('/api/run-changes', fromLastResult(r => r.runTotals, t => t.model));
  app.get('/api/streaks', fromLastResult(r => r.streaks, s => s.model));
  app.get('/api/disagreement', fromLastResult(r => r.disagreement));
  app.get('/api/composite', fromLastResult(r => r.composite));

  // Trigger a pipeline run
  app.post('/api/pipeline/run', async (req: Request, res: Response) => {
    try {
      logger.info('Manual pipeline run requested');
      const result = await scheduler.runNow();
      res.json({
        success: true,
        data: {
          id: result.id,
          stages: result.stages,
          records: result.ingest?.records ?? 0,
          outputs: result.outputs.length,
        },
      });
    } catch (error) {
      if (error instanceof PipelineBusyError) {
        res.status(409).json({ success: false, error: error.message });
        return;
      }
      logger.error('Manual pipeline run failed', error);
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  // 404 for unknown API routes
  app.use('/api', (req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  return app;
}
