/**
 * Error taxonomy for the engine.
 *
 * - ConfigurationError: degenerate weights, empty anchor table, base temperature
 *   mismatch. Always propagated.
 * - MissingInputError: an expected file or table is absent. The dependent stage
 *   is skipped.
 * - EmptyFieldError: a single time step cropped to zero cells. The step is skipped.
 *
 * Partial data and join mismatches are not errors; they surface as per-item
 * outcomes and null values.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class MissingInputError extends Error {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(message);
    this.name = 'MissingInputError';
  }
}

export class EmptyFieldError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyFieldError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
