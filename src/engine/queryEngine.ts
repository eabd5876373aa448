import * as aq from 'arquero';
import type { ProjectionExpression, WhereCondition } from '../canon/entitySpec.js';
import type { DataRecord, Dataset } from '../canon/record.js';
import { toScalarValue } from '../canon/record.js';

type EngineTable = ReturnType<typeof aq.table>;

type Relation =
  | { kind: 'base'; table: EngineTable }
  | { kind: 'table'; table: EngineTable }
  | { kind: 'view'; expression: ProjectionExpression };

export type RelationKind = Relation['kind'];

const COMPARISON_SOURCE: Record<Exclude<WhereCondition['op'], 'is_null' | 'is_not_null'>, string> = {
  eq: '===',
  neq: '!==',
  lt: '<',
  lte: '<=',
  gt: '>',
  gte: '>='
};

/**
 * In-process relations for one pipeline run, backed by Arquero tables.
 * Tables are immutable snapshots; views keep their expression and are
 * evaluated against the current relations on every read.
 */
export class QueryEngineSession {
  private readonly relations = new Map<string, Relation>();
  private closed = false;

  registerBase(name: string, dataset: Dataset): void {
    this.ensureOpen();
    const existing = this.relations.get(name);
    if (existing && existing.kind !== 'base') {
      throw new Error(`Relation '${name}' already exists as a ${existing.kind}.`);
    }
    const columns = Object.fromEntries(
      dataset.columns.map((column) => [column, dataset.rows.map((row) => row.values[column] ?? null)])
    );
    this.relations.set(name, { kind: 'base', table: aq.table(columns) });
  }

  createView(name: string, expression: ProjectionExpression): void {
    this.ensureOpen();
    const existing = this.relations.get(name);
    if (existing && existing.kind !== 'view') {
      throw new Error(`Cannot replace ${existing.kind} '${name}' with a view.`);
    }
    // Evaluate once so a broken expression is rejected at creation time.
    this.evaluate(expression);
    this.relations.set(name, { kind: 'view', expression });
  }

  createTable(name: string, expression: ProjectionExpression): void {
    this.ensureOpen();
    if (this.relations.has(name)) {
      throw new Error(`Relation '${name}' already exists.`);
    }
    this.relations.set(name, { kind: 'table', table: this.evaluate(expression).reify() });
  }

  has(name: string): boolean {
    this.ensureOpen();
    return this.relations.has(name);
  }

  kindOf(name: string): RelationKind | null {
    this.ensureOpen();
    return this.relations.get(name)?.kind ?? null;
  }

  columns(name: string): string[] {
    return this.read(name).columnNames();
  }

  rows(name: string): DataRecord[] {
    return this.read(name)
      .objects()
      .map((row) =>
        Object.fromEntries(Object.entries(row).map(([column, value]) => [column, toScalarValue(value)]))
      );
  }

  count(name: string): number {
    return this.read(name).numRows();
  }

  close(): void {
    this.relations.clear();
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private read(name: string): EngineTable {
    this.ensureOpen();
    const relation = this.relations.get(name);
    if (!relation) {
      throw new Error(`Relation '${name}' does not exist.`);
    }
    if (relation.kind === 'view') {
      return this.evaluate(relation.expression);
    }
    return relation.table;
  }

  private evaluate(expression: ProjectionExpression): EngineTable {
    let table = this.read(expression.source);
    const available = new Set(table.columnNames());
    const referenced = [
      ...(expression.columns === '*' ? [] : expression.columns),
      ...expression.where.map((condition) => condition.field),
      ...expression.orderBy.map((term) => term.field)
    ];
    const unknown = referenced.filter((column) => !available.has(column));
    if (unknown.length > 0) {
      throw new Error(
        `Unknown column(s) ${unknown.map((column) => `'${column}'`).join(', ')} in relation '${expression.source}'.`
      );
    }

    if (expression.where.length > 0) {
      const params: Record<string, string | number | boolean> = {};
      const clauses = expression.where.map((condition, index) => predicateSource(condition, `p${index}`, params));
      table = table.params(params).filter(`(d, $) => ${clauses.join(' && ')}`);
    }

    if (expression.orderBy.length > 0) {
      table = table
        .orderby(...expression.orderBy.map((term) => (term.dir === 'desc' ? aq.desc(term.field) : term.field)))
        .reify();
    }

    if (expression.columns !== '*') {
      table = table.select(...expression.columns);
    }

    if (expression.distinct) {
      table = table.dedupe();
    }

    if (expression.limit !== undefined) {
      table = table.slice(0, expression.limit);
    }

    if (expression.rename.length > 0) {
      table = table.rename(Object.fromEntries(expression.rename));
    }

    return table;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error('Query engine session is closed.');
    }
  }
}

/**
 * Column names become quoted member keys; literal values are passed as table params.
 * Comparisons never match a null cell.
 */
function predicateSource(
  condition: WhereCondition,
  param: string,
  params: Record<string, string | number | boolean>
): string {
  const column = `d[${JSON.stringify(condition.field)}]`;
  if (condition.op === 'is_null') {
    return `${column} == null`;
  }
  if (condition.op === 'is_not_null') {
    return `${column} != null`;
  }
  if (condition.value === undefined) {
    throw new Error(`Condition on '${condition.field}' is missing a value.`);
  }
  params[param] = condition.value;
  return `(${column} != null && ${column} ${COMPARISON_SOURCE[condition.op]} $.${param})`;
}

export function openQueryEngineSession(): QueryEngineSession {
  return new QueryEngineSession();
}

/** Runs `work` with a fresh session and closes it on every exit path. */
export async function withQueryEngineSession<T>(work: (session: QueryEngineSession) => Promise<T>): Promise<T> {
  const session = openQueryEngineSession();
  try {
    return await work(session);
  } finally {
    session.close();
  }
}
