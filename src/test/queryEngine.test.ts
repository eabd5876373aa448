import { describe, expect, it } from 'vitest';
import type { ProjectionExpression } from '../canon/entitySpec.js';
import { QueryEngineSession, withQueryEngineSession } from '../engine/queryEngine.js';
import { datasetOf } from './fixtures.js';

const COLUMNS = ['employee_id', 'first_name', 'country', 'salary'];

function employees() {
  return datasetOf(COLUMNS, [
    { employee_id: 1, first_name: 'Ana', country: 'ES', salary: 3000 },
    { employee_id: 2, first_name: 'Ben', country: 'FR', salary: 4000 },
    { employee_id: 3, first_name: 'Cleo', country: 'ES', salary: 1500 },
    { employee_id: 4, first_name: 'Dan', country: null, salary: 2500 }
  ]);
}

function expression(overrides: Partial<ProjectionExpression>): ProjectionExpression {
  return {
    source: 'employees_stage',
    columns: '*',
    distinct: false,
    where: [],
    orderBy: [],
    rename: [],
    ...overrides
  };
}

describe('QueryEngineSession', () => {
  it('filters, orders, selects and renames', () => {
    const session = new QueryEngineSession();
    session.registerBase('employees_stage', employees());

    session.createTable(
      'spanish',
      expression({
        columns: ['employee_id', 'first_name'],
        where: [{ field: 'country', op: 'eq', value: 'ES' }],
        orderBy: [{ field: 'salary', dir: 'desc' }],
        rename: [['employee_id', 'emp_id']]
      })
    );

    expect(session.columns('spanish')).toEqual(['emp_id', 'first_name']);
    expect(session.rows('spanish')).toEqual([
      { emp_id: 1, first_name: 'Ana' },
      { emp_id: 3, first_name: 'Cleo' }
    ]);
  });

  it('compares numbers against literal params and skips null cells', () => {
    const session = new QueryEngineSession();
    session.registerBase(
      'employees_stage',
      datasetOf(COLUMNS, [...employees().rows.map((row) => row.values), { employee_id: 5, first_name: 'Eli', country: 'ES', salary: null }])
    );

    session.createTable(
      'well_paid',
      expression({ columns: ['employee_id'], where: [{ field: 'salary', op: 'gte', value: 3000 }] })
    );
    session.createTable(
      'modest',
      expression({ columns: ['employee_id'], where: [{ field: 'salary', op: 'lt', value: 3000 }] })
    );

    expect(session.rows('well_paid')).toEqual([{ employee_id: 1 }, { employee_id: 2 }]);
    expect(session.rows('modest')).toEqual([{ employee_id: 3 }, { employee_id: 4 }]);
  });

  it('supports null checks, limits and distinct rows', () => {
    const session = new QueryEngineSession();
    session.registerBase('employees_stage', employees());

    session.createView('missing_country', expression({ columns: ['employee_id'], where: [{ field: 'country', op: 'is_null' }] }));
    session.createView(
      'cheapest',
      expression({ columns: ['employee_id'], orderBy: [{ field: 'salary', dir: 'asc' }], limit: 2 })
    );
    session.createView(
      'countries',
      expression({ columns: ['country'], distinct: true, where: [{ field: 'country', op: 'is_not_null' }] })
    );

    session.createView(
      'not_spanish',
      expression({ columns: ['employee_id'], where: [{ field: 'country', op: 'neq', value: 'ES' }] })
    );

    expect(session.rows('missing_country')).toEqual([{ employee_id: 4 }]);
    expect(session.rows('not_spanish')).toEqual([{ employee_id: 2 }]);
    expect(session.rows('cheapest')).toEqual([{ employee_id: 3 }, { employee_id: 4 }]);
    expect(session.count('countries')).toBe(2);
    expect(session.rows('countries').map((row) => row.country).sort()).toEqual(['ES', 'FR']);
  });

  it('re-evaluates views against the current base while tables stay frozen', () => {
    const session = new QueryEngineSession();
    session.registerBase('employees_stage', employees());
    const spanish = expression({ where: [{ field: 'country', op: 'eq', value: 'ES' }] });
    session.createView('spanish_view', spanish);
    session.createTable('spanish_table', spanish);

    session.registerBase(
      'employees_stage',
      datasetOf(COLUMNS, [{ employee_id: 9, first_name: 'Ivo', country: 'ES', salary: 100 }])
    );

    expect(session.count('spanish_view')).toBe(1);
    expect(session.count('spanish_table')).toBe(2);
  });

  it('replaces views but never overwrites an existing table', () => {
    const session = new QueryEngineSession();
    session.registerBase('employees_stage', employees());
    session.createView('p', expression({ columns: ['employee_id'] }));
    session.createView('p', expression({ columns: ['first_name'] }));
    session.createTable('t', expression({}));

    expect(session.columns('p')).toEqual(['first_name']);
    expect(() => session.createTable('t', expression({}))).toThrow("Relation 't' already exists.");
    expect(() => session.createView('t', expression({}))).toThrow("Cannot replace table 't' with a view.");
    expect(session.kindOf('t')).toBe('table');
  });

  it('rejects unknown columns and relations', () => {
    const session = new QueryEngineSession();
    session.registerBase('employees_stage', employees());

    expect(() => session.createView('v', expression({ columns: ['nope'] }))).toThrow(
      "Unknown column(s) 'nope' in relation 'employees_stage'."
    );
    expect(() => session.rows('v')).toThrow("Relation 'v' does not exist.");
  });
});

describe('withQueryEngineSession', () => {
  it('closes the session after the work finishes or fails', async () => {
    const sessions: QueryEngineSession[] = [];

    await withQueryEngineSession(async (session) => {
      sessions.push(session);
    });
    await expect(
      withQueryEngineSession(async (session) => {
        sessions.push(session);
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(sessions.map((session) => session.isClosed)).toEqual([true, true]);
    expect(() => sessions[0]?.has('anything')).toThrow('Query engine session is closed.');
  });
});
