import fs from 'fs';
import os from 'os';
import path from 'path';
import type { DailyRecord, WeightGrid } from '../src/types';

export function makeTempDir(prefix: string = 'hdd-engine-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(file: string, content: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
}

export function record(overrides: Partial<DailyRecord> & Pick<DailyRecord, 'date' | 'tdd'>): DailyRecord {
  const meanTemp = overrides.meanTemp ?? 65 - overrides.tdd;
  return {
    model: 'ECMWF',
    runId: '20250115_00',
    meanTemp,
    meanTempGw: overrides.meanTempGw ?? meanTemp,
    tddGw: overrides.tddGw ?? overrides.tdd,
    weighted: true,
    ...overrides,
  };
}

/**
 * Weight grid over explicit axes; values are used as given.
 */
export function makeWeightGrid(lats: number[], lons: number[], values: number[][]): WeightGrid {
  return {
    lats,
    lons,
    values,
    meta: {
      latMin: lats[0],
      latMax: lats[lats.length - 1],
      lonMin: lons[0],
      lonMax: lons[lons.length - 1],
      resolution: lats.length > 1 ? lats[1] - lats[0] : 1,
      nLats: lats.length,
      nLons: lons.length,
      convention: 'lon in 0-360',
      weightFormula: 'test',
      sigmaLat: 1,
      sigmaLon: 1,
      anchorCount: 1,
      anchorsHash: 'test',
      note: 'test grid',
    },
  };
}

/**
 * A small data directory:
 * - ECMWF runs 20250114_00 and 20250115_00 and an AIFS run as tdd tables
 * - a GFS grid field over the Permian basin for 2025-01-16
 * - daily normals of 30 HDD for Jan 15-17
 */
export function writeDataDir(dir: string, options: { normalsBaseTemp?: number } = {}): void {
  writeFile(
    path.join(dir, 'anchors.json'),
    JSON.stringify({
      anchors: [
        { id: 'TX', lat: 31.0, lon: -99.0, demand: 10, sensitivity: 10 },
        { id: 'NY', lat: 42.9, lon: 284.5, demand: 5, sensitivity: 10 },
      ],
    })
  );

  writeFile(
    path.join(dir, 'tdd', 'ecmwf', '20250114_00_tdd.csv'),
    [
      'date,mean_temp,tdd,mean_temp_gw,tdd_gw,run_id',
      '2025-01-15,35,30,34,31,20250114_00',
      '2025-01-16,33,32,32,33,20250114_00',
    ].join('\n')
  );
  writeFile(
    path.join(dir, 'tdd', 'ecmwf', '20250115_00_tdd.csv'),
    [
      'date,mean_temp,tdd,mean_temp_gw,tdd_gw,run_id',
      '2025-01-15,34,31,33,32,20250115_00',
      '2025-01-16,31,34,30,35,20250115_00',
      '2025-01-17,29,36,28,37,20250115_00',
    ].join('\n')
  );
  writeFile(
    path.join(dir, 'tdd', 'aifs', '20250115_00_tdd.csv'),
    [
      'date,mean_temp,tdd,run_id',
      '2025-01-16,27,38,20250115_00',
      '2025-01-17,29,36,20250115_00',
    ].join('\n')
  );

  writeFile(
    path.join(dir, 'fields', 'gfs', '20250115_00.json'),
    JSON.stringify({
      kind: 'grid',
      model: 'GFS',
      runId: '20250115_00',
      unit: 'F',
      lat: [30, 31],
      lon: [255, 256],
      steps: [{ validTime: '2025-01-16T00:00:00Z', values: [[20, 30], [35, 40]] }],
    })
  );

  const base = options.normalsBaseTemp === undefined ? '' : `,${options.normalsBaseTemp}`;
  const header = `month,day,hdd_normal,cdd_normal,mean_temp_f${options.normalsBaseTemp === undefined ? '' : ',base_temp_f'}`;
  writeFile(
    path.join(dir, 'normals', 'us_daily_normals.csv'),
    [header, `1,15,30,0,35${base}`, `1,16,30,0,35${base}`, `1,17,30,0,35${base}`].join('\n')
  );
}
