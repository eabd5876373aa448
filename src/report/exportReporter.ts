import type { DataRecord, IndexedRecord } from '../canon/record.js';
import type { QueryEngineSession } from '../engine/queryEngine.js';
import type { BuiltProjection, ProjectionFailure } from '../projection/projectionBuilder.js';
import type { SchemaError } from '../validation/schemaValidator.js';
import { stringifyCsv, type CsvCell } from '../lib/csv.js';
import { errorMessage } from '../lib/errors.js';
import { joinPath, writeJson, writeTextFile } from '../lib/fs.js';
import { log } from '../lib/log.js';
import { writeProjectionWorkbook, type WorkbookSheet } from '../sinks/excel/index.js';
import { formatRunSummary, type ProjectionRowCount, type RunSummary } from './summary.js';

export const SCHEMA_VALIDATION_STAGE = 'schema_validation';
export const DUPLICATES_STAGE = 'duplicates';

export function customRuleStage(field: string): string {
  return `custom_${field}`;
}

export function errorArtifactPath(outputDir: string, entity: string, stage: string): string {
  return joinPath(outputDir, 'errors', `${entity}_${stage}_errors.csv`);
}

export function projectionExportPath(outputDir: string, projection: string): string {
  return joinPath(outputDir, 'exports', `${projection}.csv`);
}

/** Source columns named like an artifact column are written as `source_<name>`. */
function snapshotColumns(columns: string[], reserved: string[]): Array<readonly [column: string, header: string]> {
  return columns.map((column) => [column, reserved.includes(column) ? `source_${column}` : column] as const);
}

function snapshotValues(
  snapshot: ReadonlyArray<readonly [column: string, header: string]>,
  values: DataRecord
): Record<string, CsvCell> {
  return Object.fromEntries(snapshot.map(([column, header]) => [header, values[column]]));
}

/** Writes nothing and returns null when there are no errors. */
export async function writeSchemaErrors(
  outputDir: string,
  entity: string,
  errors: SchemaError[],
  columns: string[]
): Promise<string | null> {
  if (errors.length === 0) {
    log.info(`no ${SCHEMA_VALIDATION_STAGE} errors to save`);
    return null;
  }
  const snapshot = snapshotColumns(columns, ['row', 'errors']);
  const rows = errors.map((error) => ({
    ...snapshotValues(snapshot, error.values),
    row: error.rowIndex,
    errors: error.messages.join('; ')
  }));
  const filePath = errorArtifactPath(outputDir, entity, SCHEMA_VALIDATION_STAGE);
  await writeTextFile(filePath, stringifyCsv(['row', 'errors', ...snapshot.map(([, header]) => header)], rows));
  log.info(`${SCHEMA_VALIDATION_STAGE} errors saved`, { path: filePath, rows: errors.length });
  return filePath;
}

/** Duplicate and rule-violation sets: the row index followed by the field snapshot. */
export async function writeRemovedRecords(
  outputDir: string,
  entity: string,
  stage: string,
  removed: IndexedRecord[],
  columns: string[]
): Promise<string | null> {
  if (removed.length === 0) {
    log.info(`no ${stage} errors to save`);
    return null;
  }
  const snapshot = snapshotColumns(columns, ['row']);
  const rows = removed.map((record) => ({ ...snapshotValues(snapshot, record.values), row: record.rowIndex }));
  const filePath = errorArtifactPath(outputDir, entity, stage);
  await writeTextFile(filePath, stringifyCsv(['row', ...snapshot.map(([, header]) => header)], rows));
  log.info(`${stage} errors saved`, { path: filePath, rows: removed.length });
  return filePath;
}

export interface ProjectionExportResult {
  exported: Array<{ name: string; path: string }>;
  failed: ProjectionFailure[];
}

export async function exportProjections(
  session: QueryEngineSession,
  projections: BuiltProjection[],
  outputDir: string
): Promise<ProjectionExportResult> {
  const result: ProjectionExportResult = { exported: [], failed: [] };

  for (const projection of projections) {
    const filePath = projectionExportPath(outputDir, projection.name);
    try {
      const rows: Array<Record<string, CsvCell>> = session.rows(projection.name);
      await writeTextFile(filePath, stringifyCsv(session.columns(projection.name), rows));
      log.info(`exported ${projection.kind} '${projection.name}'`, { path: filePath, rows: rows.length });
      result.exported.push({ name: projection.name, path: filePath });
    } catch (error) {
      const reason = `Failed to export ${projection.kind} '${projection.name}': ${errorMessage(error)}`;
      log.error(reason);
      result.failed.push({ name: projection.name, kind: projection.kind, reason });
    }
  }

  return result;
}

export async function exportProjectionWorkbook(
  session: QueryEngineSession,
  projections: BuiltProjection[],
  input: { outputDir: string; entity: string }
): Promise<string | null> {
  if (projections.length === 0) {
    return null;
  }
  const outputPath = joinPath(input.outputDir, 'exports', `${input.entity}_projections.xlsx`);
  const sheets: WorkbookSheet[] = [];
  for (const projection of projections) {
    try {
      sheets.push({
        name: projection.name,
        columns: session.columns(projection.name),
        rows: session.rows(projection.name)
      });
    } catch (error) {
      log.error(`failed to read ${projection.kind} '${projection.name}' for workbook: ${errorMessage(error)}`);
    }
  }
  await writeProjectionWorkbook({ sheets, outputPath });
  log.info('exported projection workbook', { path: outputPath, sheets: sheets.length });
  return outputPath;
}

/** A projection whose rows cannot be counted is reported as `error` instead of failing the summary. */
export function countProjectionRows(
  session: QueryEngineSession,
  projections: BuiltProjection[]
): ProjectionRowCount[] {
  return projections.map((projection) => {
    try {
      return { name: projection.name, kind: projection.kind, rows: session.count(projection.name) };
    } catch (error) {
      log.warn(`could not fetch row count for ${projection.name}: ${errorMessage(error)}`);
      return { name: projection.name, kind: projection.kind, rows: 'error' };
    }
  });
}

export function summaryPath(outputDir: string, entity: string): string {
  return joinPath(outputDir, `${entity}_summary.json`);
}

export async function emitRunSummary(summary: RunSummary, outputDir: string): Promise<string> {
  for (const line of formatRunSummary(summary)) {
    console.log(line);
  }
  const filePath = summaryPath(outputDir, summary.entity);
  await writeJson(filePath, summary);
  return filePath;
}
