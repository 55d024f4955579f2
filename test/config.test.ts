import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../src/config';
import { createLogger } from '../src/utils/logger';

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads settings from the environment', () => {
    vi.stubEnv('DATA_DIR', '/srv/engine/data');
    vi.stubEnv('PORT', '8080');
    vi.stubEnv('API_TOKEN', 'test-secret');
    vi.stubEnv('SCHEDULER_ENABLED', 'false');
    vi.stubEnv('BASE_TEMP_F', '60');

    const config = loadConfig();
    expect(config.dataDir).toBe(path.resolve('/srv/engine/data'));
    expect(config.port).toBe(8080);
    expect(config.apiToken).toBe('test-secret');
    expect(config.schedulerEnabled).toBe(false);
    expect(config.engine.baseTempF).toBe(60);
  });

  it('falls back to defaults', () => {
    vi.stubEnv('PORT', '');
    vi.stubEnv('PIPELINE_CRON', '');
    vi.stubEnv('FREEZE_OFF_MODEL', '');
    vi.stubEnv('BASE_TEMP_F', '');

    const config = loadConfig();
    expect(config.port).toBe(3000);
    expect(config.pipelineCron).toBe('15 */6 * * *');
    expect(config.freezeOffModel).toBe('GFS');
    expect(config.engine.baseTempF).toBe(65);
  });

  it('reads an optional as-of date', () => {
    vi.stubEnv('AS_OF_DATE', '');
    expect(loadConfig().asOf).toBeUndefined();

    vi.stubEnv('AS_OF_DATE', '2025-01-16');
    expect(loadConfig().asOf).toBe('2025-01-16');

    vi.stubEnv('AS_OF_DATE', '2025-02-30');
    expect(() => loadConfig()).toThrow('Environment variable AS_OF_DATE must be a YYYY-MM-DD date');
  });

  it('rejects a non-numeric port', () => {
    vi.stubEnv('PORT', 'eighty');
    expect(() => loadConfig()).toThrow('Environment variable PORT must be a number');
  });
});

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('suppresses messages below the configured level', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = createLogger('Test');
    logger.info('hidden');
    logger.warn('shown', new Error('boom'));

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/\[WARN\] \[Test\].* shown Error: boom$/);
  });

  it('prefixes child contexts', () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createLogger('Pipeline').child('ingest').info('done');
    expect(log.mock.calls[0][0]).toContain('[Pipeline:ingest]');
  });
});
