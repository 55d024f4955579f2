export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = Math.round(value * factor) / factor;
  // Normalize -0 so tables never print "-0"
  return rounded === 0 ? 0 : rounded;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function roundOrNull(value: number | null, decimals: number): number | null {
  return value === null ? null : round(value, decimals);
}

/**
 * Evenly spaced inclusive axis, computed by index to avoid float drift.
 */
export function axis(start: number, end: number, step: number): number[] {
  const count = Math.round((end - start) / step) + 1;
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(round(start + i * step, 6));
  }
  return values;
}

export function normalizeLon(lon: number): number {
  return ((lon % 360) + 360) % 360;
}
