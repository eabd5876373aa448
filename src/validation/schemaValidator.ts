import { z } from 'zod';
import type { FieldRule, FieldSchema, FieldType } from '../canon/entitySpec.js';
import type { DataRecord, Dataset, IndexedRecord, ScalarValue } from '../canon/record.js';

/**
 * Known nullable columns of the current employee exports. The fill value is still
 * type and pattern checked like any other value.
 */
export const NULLABLE_FIELD_DEFAULTS: Readonly<Record<string, ScalarValue>> = Object.freeze({
  trial_period_ends_on: '',
  ends_on: '',
  es_contract_observations: '',
  pt_contract_type_id: 0
});

export const FIELD_REQUIRED_MESSAGE = 'field required';

const NUMERIC_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const TRUE_TEXT = new Set(['true', '1', 'yes']);
const FALSE_TEXT = new Set(['false', '0', 'no']);

export interface SchemaError {
  rowIndex: number;
  values: DataRecord;
  messages: string[];
}

export interface SchemaValidationResult {
  valid: Dataset;
  errors: SchemaError[];
}

export function validateRecords(dataset: Dataset, fields: FieldSchema): SchemaValidationResult {
  const validators = new Map<string, z.ZodType<ScalarValue>>();
  for (const [name, rule] of fields) {
    validators.set(name, fieldValidator(rule));
  }

  const valid: IndexedRecord[] = [];
  const errors: SchemaError[] = [];

  for (const row of dataset.rows) {
    const output: DataRecord = {};
    const messages: string[] = [];

    for (const [name, rule] of fields) {
      const raw = row.values[name];
      let value: ScalarValue | undefined = isAbsent(raw) ? undefined : raw;
      if (value === undefined) {
        const shimmed = NULLABLE_FIELD_DEFAULTS[name];
        if (shimmed !== undefined) {
          value = shimmed;
        } else if (!rule.required) {
          output[name] = rule.defaultValue ?? null;
          continue;
        }
      }

      const validator = validators.get(name);
      if (!validator) {
        continue;
      }
      const result = validator.safeParse(value === undefined ? undefined : coerceValue(value, rule.type));
      if (result.success) {
        output[name] = result.data;
        continue;
      }
      const firstIssue = result.error.issues[0];
      messages.push(`${name}: ${firstIssue?.message ?? 'invalid value'}`);
    }

    if (messages.length > 0) {
      errors.push({ rowIndex: row.rowIndex, values: row.values, messages });
      continue;
    }
    valid.push({ rowIndex: row.rowIndex, values: output });
  }

  return {
    valid: { columns: [...fields.keys()], rows: valid },
    errors
  };
}

function fieldValidator(rule: FieldRule): z.ZodType<ScalarValue> {
  switch (rule.type) {
    case 'string': {
      let schema = z.string({
        required_error: FIELD_REQUIRED_MESSAGE,
        invalid_type_error: 'value is not a valid string'
      });
      if (rule.pattern !== undefined) {
        schema = schema.regex(new RegExp(rule.pattern), {
          message: `value does not match pattern '${rule.pattern}'`
        });
      }
      return schema;
    }
    case 'integer':
    case 'float': {
      const typeMessage = rule.type === 'integer' ? 'value is not a valid integer' : 'value is not a valid float';
      let schema = z.number({ required_error: FIELD_REQUIRED_MESSAGE, invalid_type_error: typeMessage });
      if (rule.type === 'integer') {
        schema = schema.int({ message: typeMessage });
      }
      if (rule.min !== undefined) {
        schema = schema.gte(rule.min, { message: `value must be greater than or equal to ${rule.min}` });
      }
      return schema;
    }
    case 'boolean':
      return z.boolean({
        required_error: FIELD_REQUIRED_MESSAGE,
        invalid_type_error: 'value is not a valid boolean'
      });
  }
}

function isAbsent(value: ScalarValue | undefined): value is '' | null | undefined {
  return value === undefined || value === null || value === '';
}

/** Values that cannot be coerced are passed through unchanged so the validator reports the type error. */
export function coerceValue(value: ScalarValue, type: FieldType): ScalarValue {
  switch (type) {
    case 'string':
      return typeof value === 'number' || typeof value === 'boolean' ? String(value) : value;
    case 'integer':
    case 'float': {
      if (typeof value !== 'string') {
        return value;
      }
      const trimmed = value.trim();
      if (!NUMERIC_TEXT.test(trimmed)) {
        return value;
      }
      const parsed = Number(trimmed);
      return Number.isFinite(parsed) ? parsed : value;
    }
    case 'boolean': {
      if (typeof value === 'number') {
        return value === 1 ? true : value === 0 ? false : value;
      }
      if (typeof value !== 'string') {
        return value;
      }
      const lowered = value.trim().toLowerCase();
      if (TRUE_TEXT.has(lowered)) {
        return true;
      }
      if (FALSE_TEXT.has(lowered)) {
        return false;
      }
      return value;
    }
  }
}
