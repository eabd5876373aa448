export type ScalarValue = string | number | boolean | null;

export type DataRecord = Record<string, ScalarValue>;

export interface IndexedRecord {
  /** 1-based position in the source file, stable across stages. */
  rowIndex: number;
  values: DataRecord;
}

export interface Dataset {
  columns: string[];
  rows: IndexedRecord[];
}

export function withRows(dataset: Dataset, rows: IndexedRecord[]): Dataset {
  return { columns: dataset.columns, rows };
}

export function isScalarValue(value: unknown): value is ScalarValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

export function toScalarValue(value: unknown): ScalarValue {
  if (value === undefined) {
    return null;
  }
  if (isScalarValue(value)) {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}
