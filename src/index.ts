#!/usr/bin/env node
import path from 'path';
import { loadConfig } from './config';
import type { AppConfig } from './config';
import { LEDGER_FILE, LedgerDatabase } from './db/database';
import { Pipeline } from './pipeline';
import { PipelineScheduler } from './scheduler';
import { createServer } from './api/server';
import { createLogger } from './utils/logger';
import { WeightGridBuilder } from './weights/grid';
import { WeightGridStore, loadAnchors } from './weights/store';

const logger = createLogger('Main');

type Command = 'run' | 'weights' | 'serve';

function parseCommand(arg: string | undefined): Command {
  if (arg === undefined) return 'serve';
  if (arg === 'run' || arg === 'weights' || arg === 'serve') return arg;
  throw new Error(`Unknown command "${arg}". Usage: hdd-signal-engine [run|weights|serve]`);
}

function createPipeline(config: AppConfig): Pipeline {
  return new Pipeline(config.engine, {
    dataDir: config.dataDir,
    outputDir: config.outputDir,
    freezeOffModel: config.freezeOffModel,
    seasonModel: config.seasonModel,
    asOf: config.asOf,
  });
}

function buildWeights(config: AppConfig): void {
  const anchors = loadAnchors(path.join(config.dataDir, 'anchors.json'));
  const builder = new WeightGridBuilder(config.engine);
  const grid = builder.build(anchors);
  new WeightGridStore(path.join(config.dataDir, 'weights'), config.engine).save(grid);
  logger.info(builder.describe(grid));
}

function runOnce(config: AppConfig): void {
  const result = createPipeline(config).run();
  for (const stage of result.stages) {
    logger.info(`${stage.stage.padEnd(14)} ${stage.status.padEnd(9)} ${stage.detail}`);
  }
}

function serve(config: AppConfig): void {
  const db = new LedgerDatabase(path.join(config.dataDir, LEDGER_FILE));
  const scheduler = new PipelineScheduler(createPipeline(config));

  if (config.schedulerEnabled) {
    scheduler.start(config.pipelineCron);
  } else {
    logger.warn('Scheduler disabled; runs only on POST /api/pipeline/run');
  }

  // Create and start API server
  const app = createServer(config, db, scheduler);
  const server = app.listen(config.port, () => {
    logger.info(`API listening on http://localhost:${config.port}/api (data: ${config.dataDir}, outputs: ${config.outputDir})`);
  });

  // Graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down...');
    scheduler.stop();
    server.close();
    db.close();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

function main() {
  const command = parseCommand(process.argv[2]);
  const config = loadConfig();
  logger.info(`Starting hdd-signal-engine (${command}, ${config.nodeEnv})`);

  switch (command) {
    case 'run':
      runOnce(config);
      break;
    case 'weights':
      buildWeights(config);
      break;
    case 'serve':
      serve(config);
      break;
  }
}

try {
  main();
} catch (error) {
  logger.error('Fatal error', error);
  process.exit(1);
}
