import { describe, expect, it } from 'vitest';
import { coerceValue, validateRecords } from '../validation/schemaValidator.js';
import {
  datasetOf,
  fieldSchemaOf,
  SAMPLE_EMPLOYEE_COLUMNS,
  sampleEmployeeFields,
  sampleEmployeeRows
} from './fixtures.js';

describe('validateRecords', () => {
  it('splits five rows with one missing required field into four valid and one error', () => {
    const result = validateRecords(datasetOf(SAMPLE_EMPLOYEE_COLUMNS, sampleEmployeeRows()), sampleEmployeeFields());

    expect(result.valid.rows).toHaveLength(4);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.rowIndex).toBe(3);
    expect(result.errors[0]?.messages).toEqual(['first_name: field required']);
    expect(result.errors[0]?.values.first_name).toBe('');
  });

  it('places every record in exactly one of valid or errors', () => {
    const rows = sampleEmployeeRows();
    rows[0] = { ...rows[0], employee_id: 'abc' };
    const result = validateRecords(datasetOf(SAMPLE_EMPLOYEE_COLUMNS, rows), sampleEmployeeFields());

    const validIndexes = result.valid.rows.map((row) => row.rowIndex);
    const errorIndexes = result.errors.map((error) => error.rowIndex);
    expect([...validIndexes, ...errorIndexes].sort()).toEqual([1, 2, 3, 4, 5]);
    expect(validIndexes.filter((index) => errorIndexes.includes(index))).toEqual([]);
  });

  it('coerces typed values and keeps only schema columns in schema order', () => {
    const fields = fieldSchemaOf({
      id: { type: 'integer', required: true },
      score: { type: 'float' },
      active: { type: 'boolean' }
    });
    const result = validateRecords(
      datasetOf(['active', 'id', 'extra', 'score'], [{ active: 'Yes', id: ' 7 ', extra: 'x', score: '2.5' }]),
      fields
    );

    expect(result.valid.columns).toEqual(['id', 'score', 'active']);
    expect(result.valid.rows[0]?.values).toEqual({ id: 7, score: 2.5, active: true });
  });

  it('reports type, pattern and minimum failures in field order', () => {
    const fields = fieldSchemaOf({
      employee_id: { type: 'integer', required: true },
      gender: { type: 'string', required: true, pattern: '^(male|female)$' },
      salary_amount: { type: 'float', min: 0 },
      has_payroll: { type: 'boolean' }
    });
    const result = validateRecords(
      datasetOf(['employee_id', 'gender', 'salary_amount', 'has_payroll'], [
        { employee_id: '1.5', gender: 'other', salary_amount: '-1', has_payroll: 'maybe' }
      ]),
      fields
    );

    expect(result.valid.rows).toEqual([]);
    expect(result.errors[0]?.messages).toEqual([
      'employee_id: value is not a valid integer',
      "gender: value does not match pattern '^(male|female)$'",
      'salary_amount: value must be greater than or equal to 0',
      'has_payroll: value is not a valid boolean'
    ]);
  });

  it('fills known nullable columns and still type checks the filled value', () => {
    const fields = fieldSchemaOf({
      ends_on: { type: 'string' },
      pt_contract_type_id: { type: 'integer', required: true }
    });
    const result = validateRecords(
      datasetOf(['ends_on', 'pt_contract_type_id'], [{ ends_on: '', pt_contract_type_id: '' }]),
      fields
    );

    expect(result.errors).toEqual([]);
    expect(result.valid.rows[0]?.values).toEqual({ ends_on: '', pt_contract_type_id: 0 });
  });

  it('rejects a filled nullable column that fails its pattern', () => {
    const fields = fieldSchemaOf({
      ends_on: { type: 'string', pattern: '^\\d{4}-\\d{2}-\\d{2}$' }
    });
    const result = validateRecords(datasetOf(['ends_on'], [{ ends_on: '' }]), fields);

    expect(result.valid.rows).toEqual([]);
    expect(result.errors[0]?.messages).toEqual(["ends_on: value does not match pattern '^\\d{4}-\\d{2}-\\d{2}$'"]);
  });

  it('applies configured defaults to absent optional fields and null otherwise', () => {
    const fields = fieldSchemaOf({
      address_line_2: { type: 'string', defaultValue: 'n/a' },
      siret: { type: 'string', pattern: '^\\d+$' }
    });
    const result = validateRecords(datasetOf(['address_line_2'], [{ address_line_2: '' }]), fields);

    expect(result.valid.rows[0]?.values).toEqual({ address_line_2: 'n/a', siret: null });
  });
});

describe('coerceValue', () => {
  it('leaves values it cannot coerce for the validator to reject', () => {
    expect(coerceValue('12abc', 'integer')).toBe('12abc');
    expect(coerceValue('0', 'boolean')).toBe(false);
    expect(coerceValue(3, 'string')).toBe('3');
    expect(coerceValue(2, 'boolean')).toBe(2);
  });
});
