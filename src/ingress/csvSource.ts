import type { Dataset, IndexedRecord } from '../canon/record.js';
import { parseDelimited } from '../lib/csv.js';
import { errorMessage, FormatError } from '../lib/errors.js';
import { readTextFile } from '../lib/fs.js';

export type DatasetLoader = (source: string, delimiter: string) => Promise<Dataset>;

export const loadCsvDataset: DatasetLoader = async (source, delimiter) => {
  let content: string;
  try {
    content = await readTextFile(source);
  } catch (error) {
    throw new FormatError(`Source file '${source}' could not be read: ${errorMessage(error)}`, { cause: error });
  }
  return parseCsvDataset(content, { source, delimiter });
};

/** Empty cells stay as empty strings here; the schema stage decides what is absent. */
export function parseCsvDataset(content: string, input: { source: string; delimiter?: string }): Dataset {
  let table: string[][];
  try {
    table = parseDelimited(content, input.delimiter ?? ',');
  } catch (error) {
    throw new FormatError(`Source file '${input.source}' is not a valid delimited file: ${errorMessage(error)}`, {
      cause: error
    });
  }

  const [header, ...body] = table;
  if (!header || header.length === 0) {
    throw new FormatError(`Source file '${input.source}' has no header row.`);
  }

  const columns = header.map((column) => column.trim());
  const seen = new Set<string>();
  for (const column of columns) {
    if (column.length === 0) {
      throw new FormatError(`Source file '${input.source}' has an empty column name in its header.`);
    }
    if (seen.has(column)) {
      throw new FormatError(`Source file '${input.source}' has duplicate column '${column}'.`);
    }
    seen.add(column);
  }

  const rows: IndexedRecord[] = body.map((cells, index) => ({
    rowIndex: index + 1,
    values: Object.fromEntries(columns.map((column, position) => [column, cells[position] ?? '']))
  }));

  return { columns, rows };
}
