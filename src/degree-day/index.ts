import type { EngineConfig } from '../config';
import { ConfigurationError } from '../errors';
import type { TemperatureUnit } from '../types';
import { round } from '../utils/numeric';

export function kelvinToF(k: number): number {
  return (k - 273.15) * 9 / 5 + 32;
}

export function celsiusToF(c: number): number {
  return c * 9 / 5 + 32;
}

export function toFahrenheit(value: number, unit: TemperatureUnit): number {
  switch (unit) {
    case 'K':
      return kelvinToF(value);
    case 'C':
      return celsiusToF(value);
    case 'F':
      return value;
  }
}

/**
 * Heating/cooling degree days against a fixed base temperature.
 * Stored values carry one decimal and are never negative.
 */
export class DegreeDayComputer {
  readonly baseTempF: number;

  constructor(config: Pick<EngineConfig, 'baseTempF'>) {
    this.baseTempF = config.baseTempF;
  }

  heating(tempF: number): number {
    return round(Math.max(this.baseTempF - tempF, 0), 1);
  }

  cooling(tempF: number): number {
    return round(Math.max(tempF - this.baseTempF, 0), 1);
  }

  /**
   * Stored normals and ledgers are only comparable when they were computed
   * against the same base temperature.
   */
  assertBaseTemp(storedBaseTempF: number, source: string): void {
    if (storedBaseTempF !== this.baseTempF) {
      throw new ConfigurationError(
        `${source} was computed with base ${storedBaseTempF}°F but the engine is configured for ${this.baseTempF}°F`
      );
    }
  }
}
