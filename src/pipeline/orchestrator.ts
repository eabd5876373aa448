import { baseRelationName, type EntitySpec } from '../canon/entitySpec.js';
import type { PipelineConfigFile } from '../config/pipelineConfig.js';
import { resolveEntitySpec } from '../config/pipelineConfig.js';
import { withQueryEngineSession, type QueryEngineSession } from '../engine/queryEngine.js';
import { loadCsvDataset, type DatasetLoader } from '../ingress/csvSource.js';
import { errorMessage, RuleViolationError, toPipelineError, type PipelineErrorKind } from '../lib/errors.js';
import { log } from '../lib/log.js';
import { calendarDateOf, utcDateStamp } from '../lib/time.js';
import { buildProjections } from '../projection/projectionBuilder.js';
import {
  countProjectionRows,
  customRuleStage,
  DUPLICATES_STAGE,
  emitRunSummary,
  exportProjections,
  exportProjectionWorkbook,
  writeRemovedRecords,
  writeSchemaErrors
} from '../report/exportReporter.js';
import { emptySummary, type RunStatus, type RunSummary } from '../report/summary.js';
import { deduplicate } from '../validation/deduplicationEngine.js';
import { applyCustomRules, describeRule, type RuleValidationResult } from '../validation/ruleValidator.js';
import { validateRecords } from '../validation/schemaValidator.js';

export interface RunEntityPipelineInput {
  config: PipelineConfigFile;
  entity: string;
  outputDir: string;
  loadDataset?: DatasetLoader;
  /** Reference instant for the run date and age rules. */
  now?: Date;
  exportWorkbook?: boolean;
}

export interface PipelineOutcome {
  status: RunStatus;
  summary: RunSummary;
  error?: { kind: PipelineErrorKind; message: string };
}

/**
 * Runs one entity end to end. Never throws: configuration, format and
 * unexpected errors come back as a `failed` outcome, gating validation
 * errors as `halted`.
 */
export async function runEntityPipeline(input: RunEntityPipelineInput): Promise<PipelineOutcome> {
  const now = input.now ?? new Date();
  const summary = emptySummary(input.entity, utcDateStamp(now));
  let outcome: PipelineOutcome;

  try {
    const spec = resolveEntitySpec(input.config, input.entity);
    log.info(`starting pipeline for entity '${spec.entity}'`, { source: spec.source });
    outcome = await withQueryEngineSession((session) => runStages(session, spec, summary, input, now));
  } catch (error) {
    const failure = toPipelineError(error);
    log.error(`pipeline for entity '${input.entity}' failed: ${failure.message}`);
    summary.status = 'failed';
    summary.halt_reason = failure.message;
    summary.error_kind = failure.kind;
    outcome = { status: 'failed', summary, error: { kind: failure.kind, message: failure.message } };
  }

  try {
    const summaryFile = await emitRunSummary(summary, input.outputDir);
    log.info('run summary written', { path: summaryFile });
  } catch (error) {
    log.error(`failed to write run summary: ${errorMessage(error)}`);
  }

  return outcome;
}

async function runStages(
  session: QueryEngineSession,
  spec: EntitySpec,
  summary: RunSummary,
  input: RunEntityPipelineInput,
  now: Date
): Promise<PipelineOutcome> {
  const loadDataset = input.loadDataset ?? loadCsvDataset;
  const dataset = await loadDataset(spec.source, spec.delimiter);
  summary.counts.total_rows = dataset.rows.length;
  log.info('source loaded', { rows: dataset.rows.length, columns: dataset.columns.length });

  const schema = validateRecords(dataset, spec.fields);
  summary.counts.valid_after_schema = schema.valid.rows.length;
  summary.counts.schema_errors = schema.errors.length;
  log.info('schema validation finished', { valid: schema.valid.rows.length, invalid: schema.errors.length });
  const schemaArtifact = await writeSchemaErrors(input.outputDir, spec.entity, schema.errors, dataset.columns);
  recordArtifact(summary, schemaArtifact);

  if (spec.ruleMode === 'stop' && schema.errors.length > 0) {
    return halt(summary, 'SchemaValidationError', `Schema validation errors found. ${schema.errors.length} records failed.`);
  }

  const fieldColumns = schema.valid.columns;
  const dedup = deduplicate(schema.valid, spec.compositeKeys, spec.duplicateResolution);
  summary.counts.duplicates_removed = dedup.removed.length;
  log.info('deduplication finished', {
    policy: spec.duplicateResolution,
    keys: spec.compositeKeys.length,
    removed: dedup.removed.length
  });
  recordArtifact(
    summary,
    await writeRemovedRecords(input.outputDir, spec.entity, DUPLICATES_STAGE, dedup.removed, fieldColumns)
  );

  let rules: RuleValidationResult;
  try {
    rules = applyCustomRules(dedup.deduped, spec.rules, spec.ruleMode, { today: calendarDateOf(now) });
  } catch (error) {
    if (!(error instanceof RuleViolationError)) {
      throw error;
    }
    summary.counts.rule_violations = error.rows.length;
    summary.rule_violations_by_rule.push({ field: error.field, rule: error.ruleKind, rows: error.rows.length });
    recordArtifact(
      summary,
      await writeRemovedRecords(input.outputDir, spec.entity, customRuleStage(error.field), error.rows, fieldColumns)
    );
    return halt(summary, error.kind, error.message);
  }

  summary.counts.rule_violations = rules.invalidRowCount;
  summary.counts.rows_final = rules.dataset.rows.length;
  for (const violation of rules.violations) {
    summary.rule_violations_by_rule.push({ field: violation.field, rule: violation.kind, rows: violation.rows.length });
    recordArtifact(
      summary,
      await writeRemovedRecords(
        input.outputDir,
        spec.entity,
        customRuleStage(violation.field),
        violation.rows,
        fieldColumns
      )
    );
  }
  log.info('custom validation finished', {
    rules: spec.rules.map((rule) => describeRule(rule)),
    violations: rules.invalidRowCount,
    remaining: rules.dataset.rows.length
  });

  session.registerBase(baseRelationName(spec.entity), rules.dataset);
  const projections = buildProjections(session, {
    entity: spec.entity,
    fields: spec.fields,
    projections: spec.projections
  });
  summary.projection_failures.push(...projections.failures);
  summary.projections_skipped.push(...projections.skipped);
  log.info('projections built', {
    built: projections.built.length,
    failed: projections.failures.length,
    skipped: projections.skipped.length
  });

  const exported = await exportProjections(session, projections.built, input.outputDir);
  for (const file of exported.exported) {
    recordArtifact(summary, file.path);
  }
  summary.projection_failures.push(...exported.failed);
  const failedExports = new Set(exported.failed.map((failure) => failure.name));
  const delivered = projections.built.filter((projection) => !failedExports.has(projection.name));
  if (input.exportWorkbook) {
    try {
      recordArtifact(
        summary,
        await exportProjectionWorkbook(session, delivered, { outputDir: input.outputDir, entity: spec.entity })
      );
    } catch (error) {
      log.error(`failed to write projection workbook: ${errorMessage(error)}`);
    }
  }
  summary.projections = countProjectionRows(session, delivered);

  log.info(`pipeline for entity '${spec.entity}' completed`, { rows: summary.counts.rows_final });
  return { status: 'completed', summary };
}

function halt(summary: RunSummary, kind: PipelineErrorKind, message: string): PipelineOutcome {
  log.error(`pipeline halted: ${message}`);
  summary.status = 'halted';
  summary.halt_reason = message;
  summary.error_kind = kind;
  return { status: 'halted', summary, error: { kind, message } };
}

function recordArtifact(summary: RunSummary, filePath: string | null): void {
  if (filePath !== null) {
    summary.artifacts.push(filePath);
  }
}
