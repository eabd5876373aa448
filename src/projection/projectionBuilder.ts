import type {
  FieldSchema,
  ProjectionExpression,
  ProjectionKind,
  ProjectionSpec
} from '../canon/entitySpec.js';
import { baseRelationName } from '../canon/entitySpec.js';
import type { QueryEngineSession } from '../engine/queryEngine.js';
import { errorMessage, ProjectionBuildError } from '../lib/errors.js';
import { log } from '../lib/log.js';
import { parseProjectionQuery, parseStructuredProjection, QuerySyntaxError } from './expression.js';

export interface BuiltProjection {
  name: string;
  kind: ProjectionKind;
}

export interface ProjectionFailure {
  name: string;
  kind: ProjectionKind;
  reason: string;
}

export interface ProjectionBuildResult {
  built: BuiltProjection[];
  failures: ProjectionFailure[];
  skipped: string[];
}

export interface BuildProjectionsInput {
  entity: string;
  fields: FieldSchema;
  projections: readonly ProjectionSpec[];
}

/**
 * Builds every projection against `<entity>_stage`. A projection that cannot be
 * built is recorded as a failure and the remaining ones are still attempted.
 */
export function buildProjections(session: QueryEngineSession, input: BuildProjectionsInput): ProjectionBuildResult {
  const result: ProjectionBuildResult = { built: [], failures: [], skipped: [] };

  for (const spec of input.projections) {
    if (spec.definition.form === 'empty') {
      log.warn(`No query defined for ${spec.kind} '${spec.name}' in entity '${input.entity}'. Skipping.`);
      result.skipped.push(spec.name);
      continue;
    }

    try {
      const expression = prepareProjection(spec, input.entity, input.fields);
      if (spec.kind === 'view') {
        session.createView(spec.name, expression);
      } else {
        session.createTable(spec.name, expression);
      }
      log.info(`created ${spec.kind} '${spec.name}' for entity '${input.entity}'`);
      result.built.push({ name: spec.name, kind: spec.kind });
    } catch (error) {
      const reason =
        error instanceof ProjectionBuildError
          ? error.message
          : `Failed to create ${spec.kind} '${spec.name}': ${errorMessage(error)}`;
      log.error(reason);
      result.failures.push({ name: spec.name, kind: spec.kind, reason });
    }
  }

  return result;
}

/** Parses, checks and aliases one projection; the result reads from the entity's base relation. */
export function prepareProjection(spec: ProjectionSpec, entity: string, fields: FieldSchema): ProjectionExpression {
  const base = baseRelationName(entity);
  if (spec.name === base) {
    throw new ProjectionBuildError(spec.name, `Projection name '${spec.name}' collides with the base relation.`);
  }

  const expression = parseDefinition(spec, entity);

  if (expression.source !== entity) {
    throw new ProjectionBuildError(
      spec.name,
      `Projection '${spec.name}' reads from '${expression.source}'; only entity '${entity}' can be projected.`
    );
  }

  const referenced = [
    ...(expression.columns === '*' ? [] : expression.columns),
    ...expression.where.map((condition) => condition.field),
    ...expression.orderBy.map((term) => term.field)
  ];
  const unknown = [...new Set(referenced.filter((field) => !fields.has(field)))];
  if (unknown.length > 0) {
    throw new ProjectionBuildError(
      spec.name,
      `Projection '${spec.name}' references field(s) not defined in the schema: ${unknown.join(', ')}.`
    );
  }

  const aliased = applyAliases(expression, spec, fields);
  assertDistinctOutputNames(aliased, spec.name, fields);
  return { ...aliased, source: base };
}

function parseDefinition(spec: ProjectionSpec, entity: string): ProjectionExpression {
  try {
    switch (spec.definition.form) {
      case 'query':
        return parseProjectionQuery(spec.definition.text);
      case 'structured':
        return parseStructuredProjection(spec.definition.block, entity);
      case 'empty':
        throw new ProjectionBuildError(spec.name, `Projection '${spec.name}' has no query.`);
    }
  } catch (error) {
    if (error instanceof QuerySyntaxError) {
      throw new ProjectionBuildError(spec.name, `Invalid query for ${spec.kind} '${spec.name}': ${error.message}`, {
        cause: error
      });
    }
    throw error;
  }
}

export function applyAliases(
  expression: ProjectionExpression,
  spec: Pick<ProjectionSpec, 'name' | 'aliases'>,
  fields: FieldSchema
): ProjectionExpression {
  if (spec.aliases.length === 0) {
    return expression;
  }

  const rename = new Map<string, string>(expression.rename);
  for (const [original, alias] of spec.aliases) {
    if (!fields.has(original)) {
      throw new ProjectionBuildError(
        spec.name,
        `Error in projection '${spec.name}': field '${original}' in aliases is not defined in the schema.`
      );
    }
    const projected = expression.columns === '*' || expression.columns.includes(original);
    if (!projected) {
      log.debug(`alias ${original} -> ${alias} ignored for '${spec.name}': field is not projected`);
      continue;
    }
    rename.set(original, alias);
  }

  return { ...expression, rename: [...rename.entries()] };
}

function assertDistinctOutputNames(expression: ProjectionExpression, projection: string, fields: FieldSchema): void {
  const selected = expression.columns === '*' ? [...fields.keys()] : expression.columns;
  const rename = new Map(expression.rename);
  const seen = new Set<string>();
  for (const column of selected) {
    const output = rename.get(column) ?? column;
    if (seen.has(output)) {
      throw new ProjectionBuildError(projection, `Projection '${projection}' produces column '${output}' more than once.`);
    }
    seen.add(output);
  }
}
