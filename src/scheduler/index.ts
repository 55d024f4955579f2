import cron from 'node-cron';
import { errorMessage } from '../errors';
import type { Pipeline, PipelineResult } from '../pipeline';
import { createLogger } from '../utils/logger';

const logger = createLogger('Scheduler');

export class PipelineBusyError extends Error {
  constructor() {
    super('Pipeline already in progress. Please wait a moment and try again.');
    this.name = 'PipelineBusyError';
  }
}

export interface SchedulerStatus {
  schedulerActive: boolean;
  cronExpression: string | null;
  isRunning: boolean;
  lastRunTime: string | null;
  lastRunId: string | null;
  lastError: string | null;
}

/**
 * Runs the pipeline on a cron schedule. Runs never overlap.
 */
export class PipelineScheduler {
  private cronJob: cron.ScheduledTask | null = null;
  private cronExpression: string | null = null;
  private isRunning = false;
  private lastRunTime: Date | null = null;
  private lastResult: PipelineResult | null = null;
  private lastError: string | null = null;

  constructor(private pipeline: Pipeline) {}

  /**
   * Start the scheduler; by default shortly after each 00/06/12/18z cycle.
   */
  start(cronExpression: string = '15 */6 * * *', runImmediately: boolean = true): void {
    if (this.cronJob) {
      logger.warn('Scheduler already running');
      return;
    }
    if (!cron.validate(cronExpression)) {
      throw new Error(`Invalid cron expression: ${cronExpression}`);
    }

    logger.info(`Starting pipeline scheduler with cron: ${cronExpression}`);
    this.cronExpression = cronExpression;
    this.cronJob = cron.schedule(cronExpression, async () => {
      await this.runScheduled();
    });

    if (runImmediately) {
      this.runScheduled().catch(error => logger.error('Initial pipeline run failed', error));
    }
  }

  stop(): void {
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
      this.cronExpression = null;
      logger.info('Pipeline scheduler stopped');
    }
  }

  /**
   * Scheduled run: failures are logged and kept for the status endpoint.
   */
  async runScheduled(): Promise<PipelineResult | null> {
    if (this.isRunning) {
      logger.warn('Pipeline already in progress, skipping scheduled run');
      return this.lastResult;
    }

    try {
      return await this.execute();
    } catch (error) {
      logger.error('Scheduled pipeline run failed', error);
      return null;
    }
  }

  /**
   * Manual run. Rejects with PipelineBusyError when a run is in progress and
   * with the pipeline's own error when it fails.
   */
  async runNow(): Promise<PipelineResult> {
    if (this.isRunning) {
      logger.warn('Manual run requested but the pipeline is already in progress');
      throw new PipelineBusyError();
    }
    return this.execute();
  }

  private async execute(): Promise<PipelineResult> {
    this.isRunning = true;
    this.lastRunTime = new Date();

    try {
      const result = this.pipeline.run();
      this.lastResult = result;
      this.lastError = null;
      return result;
    } catch (error) {
      this.lastError = errorMessage(error);
      throw error;
    } finally {
      this.isRunning = false;
    }
  }

  getStatus(): SchedulerStatus {
    return {
      schedulerActive: this.cronJob !== null,
      cronExpression: this.cronExpression,
      isRunning: this.isRunning,
      lastRunTime: this.lastRunTime?.toISOString() || null,
      lastRunId: this.lastResult?.id || null,
      lastError: this.lastError,
    };
  }

  getLastResult(): PipelineResult | null {
    return this.lastResult;
  }
}
