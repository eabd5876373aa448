import type { ScalarValue } from './record.js';

export type FieldType = 'string' | 'integer' | 'float' | 'boolean';

export interface FieldRule {
  type: FieldType;
  required: boolean;
  pattern?: string;
  min?: number;
  defaultValue?: ScalarValue;
}

/** Insertion order is the field order of validated records. */
export type FieldSchema = ReadonlyMap<string, FieldRule>;

export type CompositeKey = readonly string[];

export type DuplicateResolutionPolicy = 'keep_first' | 'keep_last' | 'exclude_all';

export type RuleEnforcementMode = 'stop' | 'skip';

export interface AgeGteRule {
  kind: 'age_gte';
  field: string;
  params: { minAge: number };
}

export type CustomRule = AgeGteRule;

export type ProjectionKind = 'view' | 'table';

export type ComparisonOperator = 'eq' | 'neq' | 'lt' | 'lte' | 'gt' | 'gte' | 'is_null' | 'is_not_null';

export interface WhereCondition {
  field: string;
  op: ComparisonOperator;
  value?: string | number | boolean;
}

export interface OrderTerm {
  field: string;
  dir: 'asc' | 'desc';
}

export interface ProjectionExpression {
  source: string;
  columns: '*' | string[];
  distinct: boolean;
  where: WhereCondition[];
  orderBy: OrderTerm[];
  limit?: number;
  /** Output renames applied after selection, as `[column, outputName]` pairs. */
  rename: Array<readonly [column: string, outputName: string]>;
}

/** Query text or a structured block, both parsed when the projection is built. */
export type ProjectionDefinition =
  | { form: 'query'; text: string }
  | { form: 'structured'; block: unknown }
  | { form: 'empty' };

export interface ProjectionSpec {
  name: string;
  kind: ProjectionKind;
  definition: ProjectionDefinition;
  aliases: ReadonlyArray<readonly [original: string, alias: string]>;
}

export interface EntitySpec {
  entity: string;
  source: string;
  delimiter: string;
  fields: FieldSchema;
  rules: readonly CustomRule[];
  compositeKeys: readonly CompositeKey[];
  duplicateResolution: DuplicateResolutionPolicy;
  ruleMode: RuleEnforcementMode;
  projections: readonly ProjectionSpec[];
}

export function baseRelationName(entity: string): string {
  return `${entity}_stage`;
}
