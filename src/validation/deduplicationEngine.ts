import type { CompositeKey, DuplicateResolutionPolicy } from '../canon/entitySpec.js';
import type { Dataset, IndexedRecord } from '../canon/record.js';
import { withRows } from '../canon/record.js';

export interface DeduplicationPass {
  key: CompositeKey;
  removed: IndexedRecord[];
}

export interface DeduplicationResult {
  deduped: Dataset;
  /** Removed rows of every pass, concatenated in pass order. */
  removed: IndexedRecord[];
  passes: DeduplicationPass[];
}

/**
 * Applies each composite key in order to the dataset left by the previous keys,
 * so the surviving set depends on the order the keys are declared in.
 */
export function deduplicate(
  dataset: Dataset,
  keys: readonly CompositeKey[],
  policy: DuplicateResolutionPolicy
): DeduplicationResult {
  let rows = dataset.rows;
  const passes: DeduplicationPass[] = [];

  for (const key of keys) {
    const { kept, removed } = deduplicateByKey(rows, key, policy);
    passes.push({ key, removed });
    rows = kept;
  }

  return {
    deduped: withRows(dataset, rows),
    removed: passes.flatMap((pass) => pass.removed),
    passes
  };
}

export function deduplicateByKey(
  rows: readonly IndexedRecord[],
  key: CompositeKey,
  policy: DuplicateResolutionPolicy
): { kept: IndexedRecord[]; removed: IndexedRecord[] } {
  const groups = new Map<string, number[]>();
  rows.forEach((row, position) => {
    const groupKey = compositeKeyValue(row, key);
    const members = groups.get(groupKey);
    if (members) {
      members.push(position);
      return;
    }
    groups.set(groupKey, [position]);
  });

  const dropped = new Set<number>();
  for (const members of groups.values()) {
    if (members.length < 2) {
      continue;
    }
    switch (policy) {
      case 'keep_first':
        members.slice(1).forEach((position) => dropped.add(position));
        break;
      case 'keep_last':
        members.slice(0, -1).forEach((position) => dropped.add(position));
        break;
      case 'exclude_all':
        members.forEach((position) => dropped.add(position));
        break;
    }
  }

  const kept: IndexedRecord[] = [];
  const removed: IndexedRecord[] = [];
  rows.forEach((row, position) => {
    if (dropped.has(position)) {
      removed.push(row);
      return;
    }
    kept.push(row);
  });
  return { kept, removed };
}

function compositeKeyValue(row: IndexedRecord, key: CompositeKey): string {
  return JSON.stringify(key.map((field) => row.values[field] ?? null));
}
