import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createEngineConfig } from '../src/config';
import { ConfigurationError, MissingInputError } from '../src/errors';
import { FieldAggregator } from '../src/field/aggregator';
import type { FieldRun } from '../src/field/reader';
import { RunStore, recordToRow } from '../src/ledger/run-store';
import { CompositeScorer } from '../src/market/composite';
import { DisagreementAnalyzer } from '../src/market/disagreement';
import { FreezeOffEstimator } from '../src/market/freeze-offs';
import { DemandProxies, TemperatureSeriesFileSchema, loadHubs, readSeriesFile } from '../src/market/proxies';
import type { Hub } from '../src/market/proxies';
import type { DisagreementRecord, TemperatureField } from '../src/types';
import { makeTempDir, record, removeDir, writeFile } from './fixtures';

const config = createEngineConfig();

describe('DisagreementAnalyzer', () => {
  const store = new RunStore(config);
  store.ingest([
    {
      source: 'test',
      rows: [
        record({ date: '2025-01-20', tdd: 50, runId: '20250114_00' }),
        record({ date: '2025-01-20', tdd: 20, runId: '20250115_00' }),
        record({ date: '2025-01-21', tdd: 30, runId: '20250115_00' }),
        record({ date: '2025-01-20', tdd: 22, model: 'GFS' }),
        record({ date: '2025-01-20', tdd: 25, model: 'ECMWF_AIFS' }),
      ].map(recordToRow),
    },
  ]);
  const analyzer = new DisagreementAnalyzer(config, store);

  it('compares family means from each model latest run', () => {
    expect(analyzer.analyze()).toEqual([
      {
        date: '2025-01-20',
        physicsMean: 21,
        aiMean: 25,
        spread: 4,
        disagreement: 4,
        volatilityScore: 80,
        models: { ECMWF: 20, ECMWF_AIFS: 25, GFS: 22 },
      },
      {
        date: '2025-01-21',
        physicsMean: 30,
        aiMean: null,
        spread: 0,
        disagreement: 0,
        volatilityScore: 0,
        models: { ECMWF: 30 },
      },
    ]);
  });

  it('drops dates before the as-of date', () => {
    expect(analyzer.analyze('2025-01-21').map(r => r.date)).toEqual(['2025-01-21']);
  });

  it('assigns families case-insensitively', () => {
    expect(analyzer.familyOf('ecmwf_aifs')).toBe('ai');
    expect(analyzer.familyOf('Gfs')).toBe('physics');
    expect(analyzer.familyOf('OPEN_METEO')).toBeNull();
  });

  it('caps the volatility score', () => {
    expect(analyzer.volatility(2.5)).toBe(50);
    expect(analyzer.volatility(6)).toBe(100);
  });
});

describe('CompositeScorer', () => {
  const scorer = new CompositeScorer(config);
  const calm = { powerBurn: null, windAnomaly: null, volatilityScore: 0 };

  it('clamps extreme scores to the unit interval', () => {
    expect(scorer.score({ ...calm, masterValue: 200 })).toBe(1);
    expect(scorer.score({ ...calm, masterValue: 0, windAnomaly: 100 })).toBe(-1);
  });

  it('uses the steeper slope between the hot and cold thresholds', () => {
    expect(scorer.score({ ...calm, masterValue: 20 })).toBeCloseTo(0.64, 10);
    expect(scorer.score({ ...calm, masterValue: 10 })).toBe(0);
  });

  it('maps scores to a bias', () => {
    expect(scorer.bias(0.6)).toBe('STRONG BULL');
    expect(scorer.bias(0.3)).toBe('BULLISH');
    expect(scorer.bias(0.1)).toBe('NEUTRAL');
    expect(scorer.bias(-0.3)).toBe('BEARISH');
    expect(scorer.bias(-0.6)).toBe('STRONG BEAR');
  });

  it('never lets confidence fall below the floor', () => {
    expect(scorer.confidence(0)).toBe(1);
    expect(scorer.confidence(100)).toBe(0.2);
  });

  it('joins disagreement, power burn and wind by date', () => {
    const disagreement: DisagreementRecord[] = [
      { date: '2025-01-20', physicsMean: 28, aiMean: 32, spread: 4, disagreement: 4, volatilityScore: 80, models: {} },
    ];
    const signals = scorer.combine(
      disagreement,
      [
        { date: '2025-01-20', powerBurnCdd: 15, hubs: 2 },
        { date: '2025-01-21', powerBurnCdd: 12, hubs: 2 },
      ],
      [{ date: '2025-01-20', windSpeedMs: 4, windAnomaly: -2, gasBurnImpact: 'BULLISH (Wind Drought)', hubs: 2 }]
    );

    expect(signals).toEqual([
      {
        date: '2025-01-20',
        masterValue: 30,
        disagreementSpread: 4,
        powerBurnProxy: 15,
        windAnomaly: -2,
        confidence: 0.2,
        compositeScore: 0.21,
        marketBias: 'BULLISH',
      },
      {
        date: '2025-01-21',
        masterValue: null,
        disagreementSpread: 0,
        powerBurnProxy: 12,
        windAnomaly: null,
        confidence: 1,
        compositeScore: 0.2,
        marketBias: 'BULLISH',
      },
    ]);
  });

  it('saturates at STRONG BULL for an extreme master value', () => {
    const [signal] = scorer.combine([
      { date: '2025-01-20', physicsMean: 200, aiMean: null, spread: 0, disagreement: 0, volatilityScore: 0, models: {} },
    ]);
    expect(signal).toMatchObject({ masterValue: 200, compositeScore: 1, marketBias: 'STRONG BULL' });
  });
});

describe('DemandProxies', () => {
  const proxies = new DemandProxies(config);
  const hubs: Hub[] = [
    { id: 'dallas', name: 'Dallas', lat: 32.8, lon: -96.8, weight: 25 },
    { id: 'houston', name: 'Houston', lat: 29.8, lon: -95.4, weight: 18 },
    { id: 'sweetwater_tx', name: 'Sweetwater', lat: 32.5, lon: -100.4, weight: 5 },
    { id: 'amarillo_tx', name: 'Amarillo', lat: 35.2, lon: -101.8, weight: 3 },
  ];

  it('weights hub cooling degree days', () => {
    const records = proxies.powerBurn(hubs, {
      unit: 'F',
      series: [
        { hub: 'dallas', samples: [{ date: '2025-07-01', value: 85 }, { date: '2025-07-02', value: 90 }] },
        { hub: 'houston', samples: [{ date: '2025-07-01', value: 75 }, { date: '2025-07-02', value: null }] },
        { hub: 'nowhere', samples: [{ date: '2025-07-01', value: 120 }] },
      ],
    });
    expect(records).toEqual([
      { date: '2025-07-01', powerBurnCdd: 15.81, hubs: 2 },
      { date: '2025-07-02', powerBurnCdd: 25, hubs: 1 },
    ]);
  });

  it('converts Celsius samples before computing degree days', () => {
    const [first] = proxies.powerBurn(hubs, { unit: 'C', series: [{ hub: 'dallas', samples: [{ date: '2025-07-01', value: 30 }] }] });
    expect(first.powerBurnCdd).toBe(21);
  });

  it('flags a wind drought', () => {
    const records = proxies.wind(hubs, {
      unit: 'm/s',
      series: [
        { hub: 'sweetwater_tx', samples: [{ date: '2025-07-01', value: 4 }] },
        { hub: 'amarillo_tx', samples: [{ date: '2025-07-01', value: 4 }] },
      ],
    });
    expect(records).toEqual([
      { date: '2025-07-01', windSpeedMs: 4, windAnomaly: -2, gasBurnImpact: 'BULLISH (Wind Drought)', hubs: 2 },
    ]);
  });

  it('converts km/h and flags high wind', () => {
    const [record] = proxies.wind(hubs, {
      unit: 'km/h',
      series: [{ hub: 'sweetwater_tx', samples: [{ date: '2025-07-01', value: 36 }] }],
    });
    expect(record).toMatchObject({ windSpeedMs: 10, windAnomaly: 4, gasBurnImpact: 'BEARISH (High Wind)' });
  });

  it('keeps the thresholds exclusive', () => {
    expect(proxies.windImpact(-1.5)).toBe('NEUTRAL');
    expect(proxies.windImpact(2)).toBe('NEUTRAL');
    expect(proxies.windImpact(2.01)).toBe('BEARISH (High Wind)');
  });
});

describe('hub and series files', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('loads the bundled hub tables', () => {
    expect(loadHubs(path.resolve(__dirname, '..', 'data', 'power-burn-hubs.json')).map(h => h.id)).toContain('dallas');
    expect(loadHubs(path.resolve(__dirname, '..', 'data', 'wind-hubs.json'))).toHaveLength(5);
  });

  it('reports missing files as missing input', () => {
    expect(() => loadHubs(path.join(dir, 'hubs.json'))).toThrow(MissingInputError);
    expect(() => readSeriesFile(path.join(dir, 'series.json'), TemperatureSeriesFileSchema)).toThrow(MissingInputError);
  });

  it('rejects an invalid hub table', () => {
    const file = path.join(dir, 'hubs.json');
    writeFile(file, JSON.stringify({ hubs: [{ id: 'x', name: 'X', lat: 0, lon: 0, weight: -1 }] }));
    expect(() => loadHubs(file)).toThrow(ConfigurationError);
  });

  it('validates series files', () => {
    const file = path.join(dir, 'series.json');
    writeFile(file, JSON.stringify({ unit: 'F', series: [{ hub: 'dallas', samples: [{ date: '2025-07-01', value: 80 }] }] }));
    expect(readSeriesFile(file, TemperatureSeriesFileSchema).series[0].samples[0].value).toBe(80);

    writeFile(file, JSON.stringify({ unit: 'R', series: [] }));
    expect(() => readSeriesFile(file, TemperatureSeriesFileSchema)).toThrow(/Invalid point series/);
  });
});

describe('FreezeOffEstimator', () => {
  const permian = (values: number[][]): TemperatureField => ({ kind: 'grid', unit: 'F', lats: [30, 31], lons: [255, 256], values });
  const run: FieldRun = {
    source: 'test',
    model: 'GFS',
    runId: '20250115_00',
    outcomes: [],
    steps: [
      { validTime: '2025-01-16T00:00:00Z', field: permian([[20, 30], [35, 40]]) },
      { validTime: '2025-01-16T12:00:00Z', field: permian([[25, 30], [35, 40]]) },
      { validTime: '2025-01-17T00:00:00Z', field: permian([[28, 30], [35, 40]]) },
    ],
  };

  it('estimates losses from the coldest cell per basin and day', () => {
    const records = new FreezeOffEstimator(config, new FieldAggregator(config)).estimate(run);
    expect(records).toEqual([
      {
        date: '2025-01-16',
        basins: {
          Permian: { minTempF: 20, loss: 960 },
          Anadarko: { minTempF: null, loss: 0 },
          Appalachia: { minTempF: null, loss: 0 },
          Bakken: { minTempF: null, loss: 0 },
        },
        totalLossMmcfd: 960,
      },
      {
        date: '2025-01-17',
        basins: {
          Permian: { minTempF: 28, loss: 0 },
          Anadarko: { minTempF: null, loss: 0 },
          Appalachia: { minTempF: null, loss: 0 },
          Bakken: { minTempF: null, loss: 0 },
        },
        totalLossMmcfd: 0,
      },
    ]);
  });
});
