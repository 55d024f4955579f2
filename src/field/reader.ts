import path from 'path';
import { z } from 'zod';
import { errorMessage } from '../errors';
import { listFiles, readJsonFile } from '../io/files';
import type { ItemOutcome, TemperatureField } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('FieldReader');

const UnitSchema = z.enum(['K', 'C', 'F']);

// Missing cells may be encoded as null
const CellSchema = z.number().nullable().transform(v => (v === null ? NaN : v));

const StepSchema = <T extends z.ZodTypeAny>(values: T) =>
  z.object({
    validTime: z.string().min(1),
    values,
  });

const BaseSchema = {
  model: z.string().min(1),
  runId: z.string().min(1),
  unit: UnitSchema,
  source: z.string().optional(),
};

const GridFieldFileSchema = z.object({
  kind: z.literal('grid'),
  ...BaseSchema,
  lat: z.array(z.number()).min(1),
  lon: z.array(z.number()).min(1),
  steps: z.array(StepSchema(z.array(z.array(CellSchema)))),
});

const PointFieldFileSchema = z.object({
  kind: z.literal('points'),
  ...BaseSchema,
  points: z.array(z.object({ lat: z.number(), lon: z.number(), id: z.string().optional() })).min(1),
  steps: z.array(StepSchema(z.array(CellSchema))),
});

const ScalarFieldFileSchema = z.object({
  kind: z.literal('scalar'),
  ...BaseSchema,
  steps: z.array(StepSchema(CellSchema)),
});

export const FieldFileSchema = z.discriminatedUnion('kind', [
  GridFieldFileSchema,
  PointFieldFileSchema,
  ScalarFieldFileSchema,
]);

export type FieldFile = z.infer<typeof FieldFileSchema>;

export interface FieldStep {
  validTime: string;
  field: TemperatureField;
}

export interface FieldRun {
  source: string;
  model: string;
  runId: string;
  steps: FieldStep[];
  // Steps whose shape does not match the declared axes
  outcomes: ItemOutcome[];
}

/**
 * Split a validated field file into per-step temperature fields.
 */
export function toFieldRun(file: FieldFile, source: string): FieldRun {
  const steps: FieldStep[] = [];
  const outcomes: ItemOutcome[] = [];

  switch (file.kind) {
    case 'grid':
      for (const step of file.steps) {
        const shapeOk = step.values.length === file.lat.length && step.values.every(row => row.length === file.lon.length);
        if (!shapeOk) {
          outcomes.push({ item: step.validTime, status: 'skipped', reason: `shape does not match ${file.lat.length} × ${file.lon.length} axes` });
          continue;
        }
        steps.push({
          validTime: step.validTime,
          field: { kind: 'grid', unit: file.unit, lats: file.lat, lons: file.lon, values: step.values },
        });
      }
      break;
    case 'points':
      for (const step of file.steps) {
        if (step.values.length !== file.points.length) {
          outcomes.push({ item: step.validTime, status: 'skipped', reason: `expected ${file.points.length} point values, got ${step.values.length}` });
          continue;
        }
        steps.push({
          validTime: step.validTime,
          field: { kind: 'points', unit: file.unit, points: file.points, values: step.values },
        });
      }
      break;
    case 'scalar':
      for (const step of file.steps) {
        steps.push({ validTime: step.validTime, field: { kind: 'scalar', unit: file.unit, value: step.values } });
      }
      break;
  }

  return { source: file.source ?? source, model: file.model, runId: file.runId, steps, outcomes };
}

export function readFieldFile(file: string): FieldRun {
  const parsed = FieldFileSchema.safeParse(readJsonFile(file));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid field file ${path.basename(file)}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown error'}`);
  }
  return toFieldRun(parsed.data, file);
}

/**
 * Read every field file under a directory. Files that fail to parse are
 * reported as skipped rather than failing the batch.
 */
export function readFieldDirectory(dir: string): { runs: FieldRun[]; outcomes: ItemOutcome[] } {
  const runs: FieldRun[] = [];
  const outcomes: ItemOutcome[] = [];

  for (const file of listFiles(dir, '.json')) {
    try {
      runs.push(readFieldFile(file));
      outcomes.push({ item: file, status: 'succeeded' });
    } catch (error) {
      logger.warn(`Skipping field file ${file}: ${errorMessage(error)}`);
      outcomes.push({ item: file, status: 'skipped', reason: errorMessage(error) });
    }
  }

  return { runs, outcomes };
}
