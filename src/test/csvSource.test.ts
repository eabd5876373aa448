import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadCsvDataset, parseCsvDataset } from '../ingress/csvSource.js';
import { FormatError } from '../lib/errors.js';

describe('parseCsvDataset', () => {
  it('reads the header and numbers rows from 1', () => {
    const dataset = parseCsvDataset('id;name\n1;Ana\n2;\n', { source: 'people.csv', delimiter: ';' });

    expect(dataset.columns).toEqual(['id', 'name']);
    expect(dataset.rows).toEqual([
      { rowIndex: 1, values: { id: '1', name: 'Ana' } },
      { rowIndex: 2, values: { id: '2', name: '' } }
    ]);
  });

  it('strips a byte order mark and pads short rows', () => {
    const dataset = parseCsvDataset('\uFEFFa,b\n1\n', { source: 'short.csv' });

    expect(dataset.columns).toEqual(['a', 'b']);
    expect(dataset.rows[0]?.values).toEqual({ a: '1', b: '' });
  });

  it('rejects files without a usable header', () => {
    expect(() => parseCsvDataset('', { source: 'f.csv' })).toThrow("Source file 'f.csv' has no header row.");
    expect(() => parseCsvDataset('a,a\n1,2\n', { source: 'f.csv' })).toThrow(
      "Source file 'f.csv' has duplicate column 'a'."
    );
    expect(() => parseCsvDataset('a,\n1,2\n', { source: 'f.csv' })).toThrow(
      "Source file 'f.csv' has an empty column name in its header."
    );
  });

  it('wraps parser failures in FormatError', () => {
    expect(() => parseCsvDataset('a\n"x\n', { source: 'f.csv' })).toThrow(FormatError);
    expect(() => parseCsvDataset('a\n"x\n', { source: 'f.csv' })).toThrow(
      /^Source file 'f.csv' is not a valid delimited file: /
    );
  });
});

describe('loadCsvDataset', () => {
  it('raises FormatError for an unreadable source', async () => {
    const missing = path.join(os.tmpdir(), 'entity-pipeline-missing', 'nope.csv');

    await expect(loadCsvDataset(missing, ',')).rejects.toThrow(FormatError);
    await expect(loadCsvDataset(missing, ',')).rejects.toThrow(`Source file '${missing}' could not be read: `);
  });
});
