import type { EngineConfig } from '../config';
import type { RunStore } from '../ledger/run-store';
import type {
  DailyRecord,
  DayDelta,
  RevisionDirection,
  RevisionStreak,
  RunDeltaResult,
  RunTotal,
  ShiftTableRow,
} from '../types';
import { round, roundOrNull } from '../utils/numeric';
import { createLogger } from '../utils/logger';

const logger = createLogger('RunDeltaTracker');

/**
 * English ordinal: 1st, 2nd, 3rd, 4th, 11th, 12th, 13th, 21st...
 */
export function ordinal(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) return `${n}th`;
  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

export function directionOf(change: number): RevisionDirection {
  if (change > 0) return 'bullish';
  if (change < 0) return 'bearish';
  return 'flat';
}

/**
 * Run-over-run comparisons for each model. Run ids sort chronologically.
 */
export class RunDeltaTracker {
  constructor(
    private config: Pick<EngineConfig, 'streakArrowCap'>,
    private store: RunStore
  ) {}

  /**
   * Latest run against the previous one on their shared dates.
   */
  dayAligned(model: string): RunDeltaResult {
    const runs = this.store.runIds(model);
    if (runs.length < 2) {
      return { kind: 'first_run', model, runLatest: runs[0] ?? null };
    }

    const runLatest = runs[runs.length - 1];
    const runPrev = runs[runs.length - 2];
    const previous = new Map<string, DailyRecord>();
    for (const r of this.store.recordsFor(model, runPrev)) previous.set(r.date, r);

    const rows: DayDelta[] = [];
    for (const latest of this.store.recordsFor(model, runLatest)) {
      const prev = previous.get(latest.date);
      if (!prev) continue;
      rows.push({
        date: latest.date,
        valueLatest: latest.tdd,
        valuePrev: prev.tdd,
        valueChange: round(latest.tdd - prev.tdd, 1),
        valueLatestGw: latest.tddGw,
        valuePrevGw: prev.tddGw,
        valueChangeGw: round(latest.tddGw - prev.tddGw, 1),
      });
    }

    if (rows.length === 0) {
      logger.warn(`${model}: runs ${runLatest} and ${runPrev} share no dates`);
      return { kind: 'no_overlap', model, runLatest, runPrev };
    }

    const n = rows.length;
    const meanChange = rows.reduce((acc, r) => acc + (r.valueLatest - r.valuePrev), 0) / n;
    const meanChangeGw = rows.reduce((acc, r) => acc + (r.valueLatestGw - r.valuePrevGw), 0) / n;
    return { kind: 'delta', model, runLatest, runPrev, rows, meanChange: round(meanChange, 2), meanChangeGw: round(meanChangeGw, 2) };
  }

  /**
   * Total degree days per run and the change against the previous run.
   */
  runAligned(model: string): RunTotal[] {
    const totals: RunTotal[] = [];
    let prev: { total: number; totalGw: number } | null = null;

    for (const runId of this.store.runIds(model)) {
      const records = this.store.recordsFor(model, runId);
      const total = records.reduce((acc, r) => acc + r.tdd, 0);
      const totalGw = records.reduce((acc, r) => acc + r.tddGw, 0);
      totals.push({
        model,
        runId,
        days: records.length,
        total: round(total, 1),
        totalGw: round(totalGw, 1),
        mean: round(total / records.length, 2),
        meanGw: round(totalGw / records.length, 2),
        change: prev ? round(total - prev.total, 1) : null,
        changeGw: prev ? round(totalGw - prev.totalGw, 1) : null,
      });
      prev = { total, totalGw };
    }

    return totals;
  }

  /**
   * Consecutive same-direction revisions ending at the latest run.
   */
  streak(model: string): RevisionStreak {
    const changes: number[] = [];
    for (const t of this.runAligned(model)) {
      if (t.change !== null) changes.push(t.change);
    }
    return this.streakFromChanges(model, changes, this.store.latestRun(model));
  }

  streakFromChanges(model: string, changes: readonly number[], runLatest: string | null): RevisionStreak {
    if (changes.length === 0 || runLatest === null) {
      return { kind: 'first_run', model, label: 'First run (no prior run to compare)' };
    }

    const latestChange = changes[changes.length - 1];
    const direction = directionOf(latestChange);
    let count = 0;
    for (let i = changes.length - 1; i >= 0; i--) {
      if (directionOf(changes[i]) !== direction) break;
      count++;
    }

    const arrow = direction === 'bullish' ? '↑' : direction === 'bearish' ? '↓' : '';
    const arrows = arrow.repeat(Math.min(count, this.config.streakArrowCap));
    const label =
      direction === 'flat'
        ? `${ordinal(count)} consecutive flat run`
        : `${ordinal(count)} consecutive ${direction} revision`;

    return { kind: 'streak', model, runLatest, latestChange, direction, count, ordinal: ordinal(count), arrows, label };
  }

  /**
   * Gas-weighted day-by-day change of the latest run against the previous one,
   * one column per model. Dates present in only one run get null.
   */
  shiftTable(models: readonly string[] = this.store.models()): ShiftTableRow[] {
    const columns = new Map<string, Map<string, number | null>>();
    const dates = new Set<string>();

    for (const model of models) {
      const runs = this.store.runIds(model);
      if (runs.length < 2) continue;

      const latest = new Map(this.store.recordsFor(model, runs[runs.length - 1]).map(r => [r.date, r.tddGw]));
      const prev = new Map(this.store.recordsFor(model, runs[runs.length - 2]).map(r => [r.date, r.tddGw]));
      const shifts = new Map<string, number | null>();
      for (const date of new Set([...latest.keys(), ...prev.keys()])) {
        const a = latest.get(date);
        const b = prev.get(date);
        shifts.set(date, a === undefined || b === undefined ? null : a - b);
        dates.add(date);
      }
      columns.set(`${model} Op Chg`, shifts);
    }

    const rows: ShiftTableRow[] = [];
    for (const date of [...dates].sort()) {
      const changes: Record<string, number | null> = {};
      let hasValue = false;
      for (const [column, shifts] of columns) {
        const value = roundOrNull(shifts.get(date) ?? null, 1);
        changes[column] = value;
        if (value !== null) hasValue = true;
      }
      if (hasValue) rows.push({ date, changes });
    }
    return rows;
  }
}
