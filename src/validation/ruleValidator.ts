import type { CustomRule, RuleEnforcementMode } from '../canon/entitySpec.js';
import type { DataRecord, Dataset, IndexedRecord } from '../canon/record.js';
import { withRows } from '../canon/record.js';
import { RuleViolationError } from '../lib/errors.js';
import { log } from '../lib/log.js';
import { parseCalendarDate, wholeYearsBetween, type CalendarDate } from '../lib/time.js';

export interface RuleViolation {
  field: string;
  kind: CustomRule['kind'];
  params: CustomRule['params'];
  rows: IndexedRecord[];
}

export interface RuleValidationResult {
  dataset: Dataset;
  violations: RuleViolation[];
  invalidRowCount: number;
}

export interface RuleContext {
  today: CalendarDate;
}

export function violatesRule(rule: CustomRule, values: DataRecord, context: RuleContext): boolean {
  switch (rule.kind) {
    case 'age_gte': {
      const value = values[rule.field];
      if (value === undefined || value === null || value === '') {
        // no date, no age to compare
        return false;
      }
      const born = parseCalendarDate(value);
      if (!born) {
        return true;
      }
      return wholeYearsBetween(born, context.today) < rule.params.minAge;
    }
  }
}

export function describeRule(rule: CustomRule): string {
  switch (rule.kind) {
    case 'age_gte':
      return `${rule.kind}(min_age=${rule.params.minAge}) on ${rule.field}`;
  }
}

/**
 * Rules run in declaration order. Under `stop` the first rule with violations throws
 * a RuleViolationError carrying its rows; under `skip` violating rows are removed
 * before the next rule runs.
 */
export function applyCustomRules(
  dataset: Dataset,
  rules: readonly CustomRule[],
  mode: RuleEnforcementMode,
  context: RuleContext
): RuleValidationResult {
  let rows = dataset.rows;
  const violations: RuleViolation[] = [];
  let invalidRowCount = 0;

  for (const rule of rules) {
    log.info(`running custom validation ${describeRule(rule)}`);
    const violating = rows.filter((row) => violatesRule(rule, row.values, context));
    invalidRowCount += violating.length;
    if (violating.length === 0) {
      continue;
    }

    if (mode === 'stop') {
      throw new RuleViolationError({ field: rule.field, ruleKind: rule.kind, rows: violating });
    }

    const violatingSet = new Set(violating);
    rows = rows.filter((row) => !violatingSet.has(row));
    violations.push({ field: rule.field, kind: rule.kind, params: rule.params, rows: violating });
    log.info(`skipped ${violating.length} rows failing ${describeRule(rule)}`);
  }

  return { dataset: withRows(dataset, rows), violations, invalidRowCount };
}
