import type { IndexedRecord } from '../canon/record.js';

export type PipelineErrorKind =
  | 'ConfigurationError'
  | 'FormatError'
  | 'SchemaValidationError'
  | 'RuleViolation'
  | 'ProjectionBuildError'
  | 'UnexpectedError';

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

/** Missing or inconsistent entity configuration. Raised before any stage runs. */
export class ConfigurationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ConfigurationError', message, options);
  }
}

/** The source file could not be read or is not a well-formed delimited table. */
export class FormatError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FormatError', message, options);
  }
}

export class RuleViolationError extends PipelineError {
  readonly field: string;
  readonly ruleKind: string;
  readonly rows: IndexedRecord[];

  constructor(input: { field: string; ruleKind: string; rows: IndexedRecord[] }) {
    super(
      'RuleViolation',
      `Custom validation failed for field '${input.field}' with ${input.ruleKind} (${input.rows.length} rows).`
    );
    this.field = input.field;
    this.ruleKind = input.ruleKind;
    this.rows = input.rows;
  }
}

export class ProjectionBuildError extends PipelineError {
  readonly projection: string;

  constructor(projection: string, message: string, options?: { cause?: unknown }) {
    super('ProjectionBuildError', message, options);
    this.projection = projection;
  }
}

export class UnexpectedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UnexpectedError', message, options);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function toPipelineError(error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  return new UnexpectedError(`An unexpected error occurred: ${errorMessage(error)}`, { cause: error });
}
