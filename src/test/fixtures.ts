import type { FieldRule, FieldSchema, FieldType } from '../canon/entitySpec.js';
import type { DataRecord, Dataset } from '../canon/record.js';
import { parsePipelineConfig, type PipelineConfigFile } from '../config/pipelineConfig.js';

/** Row indexes follow array position, starting at 1. */
export function datasetOf(columns: string[], rows: DataRecord[]): Dataset {
  return {
    columns,
    rows: rows.map((values, index) => ({ rowIndex: index + 1, values }))
  };
}

export function fieldSchemaOf(
  rules: Record<string, { type: FieldType } & Partial<Omit<FieldRule, 'type'>>>
): FieldSchema {
  return new Map(
    Object.entries(rules).map(([name, rule]) => [name, { required: false, ...rule }] as const)
  );
}

export function sampleEmployeeRows(): DataRecord[] {
  return [
    { employee_id: '1', company_id: '10', first_name: 'Ana', birthday_on: '1990-04-12', country: 'ES' },
    { employee_id: '2', company_id: '10', first_name: 'Ben', birthday_on: '1985-09-30', country: 'FR' },
    { employee_id: '3', company_id: '10', first_name: '', birthday_on: '1979-11-05', country: 'PT' },
    { employee_id: '4', company_id: '20', first_name: 'Dan', birthday_on: '1992-07-21', country: 'ES' },
    { employee_id: '5', company_id: '20', first_name: 'Eva', birthday_on: '2001-01-15', country: 'ES' }
  ];
}

export const SAMPLE_EMPLOYEE_COLUMNS = ['employee_id', 'company_id', 'first_name', 'birthday_on', 'country'];

export function sampleEmployeeFields(): FieldSchema {
  return fieldSchemaOf({
    employee_id: { type: 'integer', required: true },
    company_id: { type: 'integer', required: true },
    first_name: { type: 'string', required: true },
    birthday_on: { type: 'string', required: true, pattern: '^\\d{4}-\\d{2}-\\d{2}$' },
    country: { type: 'string', required: true }
  });
}

export function configFromYaml(yaml: string, filePath = '/configs/pipeline.yaml'): PipelineConfigFile {
  return parsePipelineConfig(yaml, filePath);
}
