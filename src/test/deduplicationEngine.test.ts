import { describe, expect, it } from 'vitest';
import { deduplicate, deduplicateByKey } from '../validation/deduplicationEngine.js';
import { datasetOf } from './fixtures.js';

const COLUMNS = ['a', 'b', 'c'];

describe('deduplicate', () => {
  it('keeps the last row of a group under keep_last', () => {
    const dataset = datasetOf(COLUMNS, [
      { a: 1, b: 1, c: 'first' },
      { a: 1, b: 1, c: 'second' },
      { a: 1, b: 1, c: 'third' }
    ]);

    const result = deduplicate(dataset, [['a', 'b']], 'keep_last');

    expect(result.deduped.rows.map((row) => row.values.c)).toEqual(['third']);
    expect(result.removed.map((row) => row.rowIndex)).toEqual([1, 2]);
  });

  it('keeps the first row of a group under keep_first', () => {
    const dataset = datasetOf(COLUMNS, [
      { a: 1, b: 1, c: 'first' },
      { a: 2, b: 1, c: 'other' },
      { a: 1, b: 1, c: 'second' }
    ]);

    const result = deduplicate(dataset, [['a', 'b']], 'keep_first');

    expect(result.deduped.rows.map((row) => row.rowIndex)).toEqual([1, 2]);
    expect(result.removed.map((row) => row.rowIndex)).toEqual([3]);
  });

  it('removes every member of a duplicated group under exclude_all', () => {
    const dataset = datasetOf(COLUMNS, [
      { a: 1, b: 1, c: 'x' },
      { a: 1, b: 1, c: 'y' },
      { a: 3, b: 3, c: 'z' },
      { a: 1, b: 1, c: 'w' }
    ]);

    const result = deduplicate(dataset, [['a', 'b']], 'exclude_all');

    expect(result.deduped.rows.map((row) => row.rowIndex)).toEqual([3]);
    expect(result.removed).toHaveLength(3);
  });

  it('applies keys sequentially so their order changes the survivors', () => {
    const dataset = datasetOf(COLUMNS, [
      { a: 1, b: 1, c: 1 },
      { a: 1, b: 2, c: 1 },
      { a: 2, b: 2, c: 2 }
    ]);

    const aThenB = deduplicate(dataset, [['a'], ['b']], 'keep_first');
    const bThenA = deduplicate(dataset, [['b'], ['a']], 'keep_first');

    expect(aThenB.deduped.rows.map((row) => row.rowIndex)).toEqual([1, 3]);
    expect(bThenA.deduped.rows.map((row) => row.rowIndex)).toEqual([1]);
    expect(bThenA.passes.map((pass) => pass.removed.map((row) => row.rowIndex))).toEqual([[3], [2]]);
  });

  it('returns the dataset unchanged when no keys are configured', () => {
    const dataset = datasetOf(COLUMNS, [{ a: 1, b: 1, c: 1 }, { a: 1, b: 1, c: 1 }]);

    const result = deduplicate(dataset, [], 'exclude_all');

    expect(result.deduped.rows).toHaveLength(2);
    expect(result.removed).toEqual([]);
  });
});

describe('deduplicateByKey', () => {
  it('groups missing and null key values together', () => {
    const rows = datasetOf(COLUMNS, [{ a: null, b: 1 }, { b: 1 }]).rows;

    const { kept, removed } = deduplicateByKey(rows, ['a', 'b'], 'keep_first');

    expect(kept.map((row) => row.rowIndex)).toEqual([1]);
    expect(removed.map((row) => row.rowIndex)).toEqual([2]);
  });
});
