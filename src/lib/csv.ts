import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';

const rawRowsSchema = z.array(z.array(z.string()));

export type CsvCell = string | number | boolean | null | undefined;

export function parseDelimited(content: string, delimiter = ','): string[][] {
  const parsed: unknown = parse(content, {
    delimiter,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true
  });
  return rawRowsSchema.parse(parsed);
}

export function stringifyCsv(columns: string[], rows: Array<Record<string, CsvCell>>): string {
  return stringify(rows, {
    header: true,
    columns,
    delimiter: ',',
    cast: {
      boolean: (value) => (value ? 'true' : 'false')
    }
  });
}
