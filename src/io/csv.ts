import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { MissingInputError } from '../errors';
import { ensureDir } from './files';

export type CsvCell = string | number | boolean | null;

/**
 * Column definitions for an output table: header name plus accessor.
 */
export type CsvColumns<T> = ReadonlyArray<readonly [header: string, value: (row: T) => CsvCell]>;

const CsvRowsSchema = z.array(z.record(z.string()));

/**
 * Parse CSV text with a header line into one string record per row.
 */
export function parseCsv(text: string): Record<string, string>[] {
  const raw: unknown = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });
  return CsvRowsSchema.parse(raw);
}

export function readCsv(file: string): Record<string, string>[] {
  if (!fs.existsSync(file)) {
    throw new MissingInputError(`CSV file not found: ${file}`, file);
  }
  return parseCsv(fs.readFileSync(file, 'utf-8'));
}

export function toCsv<T>(rows: readonly T[], columns: CsvColumns<T>): string {
  const header = columns.map(([name]) => name);
  const body = rows.map(row => columns.map(([, value]) => value(row)));
  return stringify([header, ...body], {
    cast: {
      boolean: value => (value ? 'true' : 'false'),
    },
  });
}

export function writeCsv<T>(file: string, rows: readonly T[], columns: CsvColumns<T>): void {
  ensureDir(path.dirname(file));
  fs.writeFileSync(file, toCsv(rows, columns));
}

// Cell schemas shared by the row validators. Blank cells read as absent.

function blankToUndefined(value: unknown): unknown {
  if (value === null) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

function toNumber(value: unknown): unknown {
  const v = blankToUndefined(value);
  return typeof v === 'string' ? Number(v) : v;
}

export const numberCell = z.preprocess(toNumber, z.number().finite());

export const optionalNumberCell = z.preprocess(toNumber, z.number().finite().optional());

export const optionalStringCell = z.preprocess(blankToUndefined, z.string().trim().min(1).optional());

export const optionalBooleanCell = z.preprocess(value => {
  const v = blankToUndefined(value);
  if (typeof v === 'string') return ['true', '1', 'yes'].includes(v.toLowerCase());
  if (typeof v === 'number') return v !== 0;
  return v;
}, z.boolean().optional());
