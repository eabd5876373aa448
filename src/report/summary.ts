import type { ProjectionKind } from '../canon/entitySpec.js';
import type { PipelineErrorKind } from '../lib/errors.js';

export type RunStatus = 'completed' | 'halted' | 'failed';

export interface RuleViolationCount {
  field: string;
  rule: string;
  rows: number;
}

export interface ProjectionRowCount {
  name: string;
  kind: ProjectionKind;
  rows: number | 'error';
}

export interface RunSummary {
  entity: string;
  run_date: string;
  status: RunStatus;
  halt_reason: string | null;
  error_kind: PipelineErrorKind | null;
  counts: {
    total_rows: number;
    valid_after_schema: number;
    schema_errors: number;
    duplicates_removed: number;
    rule_violations: number;
    rows_final: number;
  };
  rule_violations_by_rule: RuleViolationCount[];
  projections: ProjectionRowCount[];
  projection_failures: Array<{ name: string; kind: ProjectionKind; reason: string }>;
  projections_skipped: string[];
  artifacts: string[];
}

export function emptySummary(entity: string, runDate: string): RunSummary {
  return {
    entity,
    run_date: runDate,
    status: 'completed',
    halt_reason: null,
    error_kind: null,
    counts: {
      total_rows: 0,
      valid_after_schema: 0,
      schema_errors: 0,
      duplicates_removed: 0,
      rule_violations: 0,
      rows_final: 0
    },
    rule_violations_by_rule: [],
    projections: [],
    projection_failures: [],
    projections_skipped: [],
    artifacts: []
  };
}

export function formatRunSummary(summary: RunSummary): string[] {
  const lines = [
    `Processing Summary (${summary.entity}, ${summary.run_date}): ${summary.status}`,
    `Total rows processed: ${summary.counts.total_rows}`,
    `Total valid rows after schema validation: ${summary.counts.valid_after_schema}`,
    `Total rows with schema validation errors: ${summary.counts.schema_errors}`,
    `Total duplicate rows removed: ${summary.counts.duplicates_removed}`,
    `Total rows with custom validation errors: ${summary.counts.rule_violations}`
  ];
  for (const violation of summary.rule_violations_by_rule) {
    lines.push(`  ${violation.field} (${violation.rule}): ${violation.rows}`);
  }
  lines.push(`Rows after validation: ${summary.counts.rows_final}`);
  if (summary.halt_reason !== null) {
    lines.push(`Stopped: ${summary.halt_reason}`);
  }

  lines.push('Projection Summary:');
  if (summary.projections.length === 0) {
    lines.push('  (none)');
  }
  for (const projection of summary.projections) {
    const rows = projection.rows === 'error' ? 'error' : `${projection.rows} rows`;
    lines.push(`  ${projection.name} (${projection.kind}): ${rows}`);
  }
  for (const failure of summary.projection_failures) {
    lines.push(`  ${failure.name} (${failure.kind}): failed - ${failure.reason}`);
  }
  if (summary.projections_skipped.length > 0) {
    lines.push(`  skipped: ${summary.projections_skipped.join(', ')}`);
  }
  return lines;
}
