import { describe, expect, it } from 'vitest';
import { DEFAULT_ENGINE_CONFIG, createEngineConfig } from '../src/config';
import { DegreeDayComputer, celsiusToF, kelvinToF, toFahrenheit } from '../src/degree-day';
import { ConfigurationError } from '../src/errors';
import { axis, clamp, mean, normalizeLon, round } from '../src/utils/numeric';

describe('DegreeDayComputer', () => {
  const dd = new DegreeDayComputer({ baseTempF: 65 });

  it('computes heating degree days below the base', () => {
    expect(dd.heating(50)).toBe(15);
    expect(dd.heating(64.96)).toBe(0);
    expect(dd.heating(31.25)).toBe(33.8);
  });

  it('computes cooling degree days above the base', () => {
    expect(dd.cooling(75)).toBe(10);
    expect(dd.cooling(50)).toBe(0);
  });

  it('returns zero for both at the base temperature', () => {
    expect(dd.heating(65)).toBe(0);
    expect(dd.cooling(65)).toBe(0);
  });

  it('rejects a stored base temperature that differs from the configured one', () => {
    expect(() => dd.assertBaseTemp(65, 'ledger')).not.toThrow();
    expect(() => dd.assertBaseTemp(60, 'ledger')).toThrow(ConfigurationError);
  });
});

describe('unit conversion', () => {
  it('converts Kelvin and Celsius to Fahrenheit', () => {
    expect(kelvinToF(273.15)).toBe(32);
    expect(celsiusToF(100)).toBe(212);
    expect(celsiusToF(-40)).toBe(-40);
    expect(toFahrenheit(72, 'F')).toBe(72);
    expect(toFahrenheit(300, 'K')).toBeCloseTo(80.33, 6);
  });
});

describe('numeric helpers', () => {
  it('rounds without producing negative zero', () => {
    expect(round(2.345, 1)).toBe(2.3);
    expect(Object.is(round(-0.04, 1), 0)).toBe(true);
  });

  it('returns null for the mean of nothing', () => {
    expect(mean([])).toBeNull();
    expect(mean([1, 2, 3])).toBe(2);
  });

  it('builds inclusive axes without drift', () => {
    expect(axis(25, 26, 0.25)).toEqual([25, 25.25, 25.5, 25.75, 26]);
    expect(axis(25, 50, 0.25)).toHaveLength(101);
  });

  it('normalises longitudes to 0-360', () => {
    expect(normalizeLon(-100)).toBe(260);
    expect(normalizeLon(260)).toBe(260);
    expect(normalizeLon(-360)).toBe(0);
  });

  it('clamps into range', () => {
    expect(clamp(4, -1, 1)).toBe(1);
    expect(clamp(-4, -1, 1)).toBe(-1);
  });
});

describe('createEngineConfig', () => {
  it('merges nested overrides and freezes the result', () => {
    const config = createEngineConfig({ baseTempF: 60, region: { latMin: 30 } });
    expect(config.baseTempF).toBe(60);
    expect(config.region).toEqual({ ...DEFAULT_ENGINE_CONFIG.region, latMin: 30 });
    expect(Object.isFrozen(config.region)).toBe(true);
    expect(DEFAULT_ENGINE_CONFIG.region.latMin).toBe(25);
  });

  it('keeps the default for overrides set to undefined', () => {
    const config = createEngineConfig({ baseTempF: undefined, region: { latMin: undefined, latMax: 48 } });
    expect(config.baseTempF).toBe(65);
    expect(config.region).toEqual({ latMin: 25, latMax: 48, lonMin: 235, lonMax: 295 });
  });
});
