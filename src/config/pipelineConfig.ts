import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type {
  CompositeKey,
  CustomRule,
  DuplicateResolutionPolicy,
  EntitySpec,
  FieldRule,
  FieldType,
  ProjectionDefinition,
  ProjectionSpec
} from '../canon/entitySpec.js';
import { ConfigurationError, errorMessage } from '../lib/errors.js';
import { readTextFile } from '../lib/fs.js';

const FIELD_TYPE_NAMES: Record<string, FieldType> = {
  str: 'string',
  string: 'string',
  int: 'integer',
  integer: 'integer',
  float: 'float',
  number: 'float',
  bool: 'boolean',
  boolean: 'boolean'
};

const fieldRuleSchema = z.object({
  type: z
    .string()
    .default('str')
    .refine((value) => value in FIELD_TYPE_NAMES, {
      message: `type must be one of ${Object.keys(FIELD_TYPE_NAMES).join(', ')}`
    }),
  required: z.boolean().default(false),
  pattern: z.string().optional(),
  min: z.number().optional(),
  default: z.union([z.string(), z.number(), z.boolean(), z.null()]).optional()
});

const customRuleSchema = z.object({
  field: z.string().min(1),
  validation: z.string().min(1),
  params: z.record(z.string(), z.unknown()).nullable().optional()
});

const ageGteParamsSchema = z.object({
  min_age: z.number().default(0)
});

const projectionSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['view', 'table']),
  query: z.string().nullable().optional(),
  select: z.unknown().optional(),
  where: z.unknown().optional(),
  order_by: z.unknown().optional(),
  limit: z.unknown().optional(),
  distinct: z.unknown().optional(),
  aliases: z.record(z.string(), z.string()).nullable().optional()
});

const entitySchema = z.object({
  source: z.string().min(1),
  delimiter: z.string().length(1).default(','),
  settings: z.object({
    duplicate_resolution: z.enum(['first', 'last', 'keep_first', 'keep_last', 'exclude_all']),
    custom_validation_mode: z.enum(['stop', 'skip']),
    unique_composite: z.array(z.array(z.string().min(1)).min(1)).nullable().optional()
  }),
  validations: z.object({
    schema: z.object({
      fields: z.record(z.string(), fieldRuleSchema)
    }),
    custom: z
      .object({
        rules: z.array(customRuleSchema).nullable().optional()
      })
      .nullable()
      .optional()
  }),
  projections: z.array(projectionSchema).nullable().optional()
});

const configFileSchema = z.object({
  transformations_config: z.record(z.string(), z.unknown())
});

type EntityConfig = z.infer<typeof entitySchema>;

export interface PipelineConfigFile {
  path: string;
  directory: string;
  entities: Record<string, unknown>;
}

export async function loadPipelineConfig(filePath: string): Promise<PipelineConfigFile> {
  const resolved = path.resolve(filePath);
  let content: string;
  try {
    content = await readTextFile(resolved);
  } catch (error) {
    throw new ConfigurationError(`Configuration file '${resolved}' could not be read: ${errorMessage(error)}`, {
      cause: error
    });
  }
  return parsePipelineConfig(content, resolved);
}

export function parsePipelineConfig(content: string, filePath: string): PipelineConfigFile {
  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Configuration file '${filePath}' is not valid YAML: ${errorMessage(error)}`, {
      cause: error
    });
  }

  const parsed = configFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      `Configuration file '${filePath}' must define a 'transformations_config' mapping.`
    );
  }

  return {
    path: filePath,
    directory: path.dirname(filePath),
    entities: parsed.data.transformations_config
  };
}

export function listEntities(config: PipelineConfigFile): string[] {
  return Object.keys(config.entities);
}

export function resolveEntitySpec(config: PipelineConfigFile, entity: string): EntitySpec {
  if (!Object.prototype.hasOwnProperty.call(config.entities, entity)) {
    throw new ConfigurationError(`Entity '${entity}' not found in the configuration.`);
  }
  const details = config.entities[entity];
  if (!isPlainObject(details)) {
    throw new ConfigurationError(`Configuration for entity '${entity}' must be a mapping.`);
  }

  for (const key of ['source', 'settings', 'validations']) {
    if (details[key] === undefined || details[key] === null) {
      throw new ConfigurationError(`Missing required configuration '${key}' for entity '${entity}'.`);
    }
  }
  const settings = details.settings;
  for (const key of ['duplicate_resolution', 'custom_validation_mode']) {
    if (!isPlainObject(settings) || settings[key] === undefined || settings[key] === null) {
      throw new ConfigurationError(`Missing '${key}' in settings for entity '${entity}'.`);
    }
  }

  const parsed = entitySchema.safeParse(details);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration for entity '${entity}': ${issues}`);
  }

  return buildEntitySpec(entity, parsed.data, config.directory);
}

function buildEntitySpec(entity: string, input: EntityConfig, configDir: string): EntitySpec {
  const fields = new Map<string, FieldRule>();
  for (const [name, rule] of Object.entries(input.validations.schema.fields)) {
    const type = FIELD_TYPE_NAMES[rule.type] ?? 'string';
    if (rule.pattern !== undefined) {
      assertValidPattern(entity, name, rule.pattern);
    }
    fields.set(name, {
      type,
      required: rule.required,
      pattern: rule.pattern,
      min: type === 'integer' || type === 'float' ? rule.min : undefined,
      defaultValue: rule.default
    });
  }

  const rules = (input.validations.custom?.rules ?? []).map((rule) => buildCustomRule(entity, rule, fields));

  const compositeKeys: CompositeKey[] = (input.settings.unique_composite ?? []).map((key) => {
    const missing = key.filter((field) => !fields.has(field));
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Composite key [${key.join(', ')}] for entity '${entity}' references fields not defined in the schema: ${missing.join(', ')}.`
      );
    }
    return Object.freeze([...key]);
  });

  const projections = (input.projections ?? []).map((projection) => buildProjectionSpec(projection));

  return Object.freeze({
    entity,
    source: path.resolve(configDir, input.source),
    delimiter: input.delimiter,
    fields,
    rules: Object.freeze(rules),
    compositeKeys: Object.freeze(compositeKeys),
    duplicateResolution: normalizePolicy(input.settings.duplicate_resolution),
    ruleMode: input.settings.custom_validation_mode,
    projections: Object.freeze(projections)
  });
}

function buildCustomRule(
  entity: string,
  rule: z.infer<typeof customRuleSchema>,
  fields: ReadonlyMap<string, FieldRule>
): CustomRule {
  if (!fields.has(rule.field)) {
    throw new ConfigurationError(
      `Custom rule '${rule.validation}' for entity '${entity}' references field '${rule.field}' which is not defined in the schema.`
    );
  }

  switch (rule.validation) {
    case 'age_gte': {
      const params = ageGteParamsSchema.safeParse(rule.params ?? {});
      if (!params.success) {
        throw new ConfigurationError(
          `Invalid params for age_gte on field '${rule.field}' in entity '${entity}': min_age must be a number.`
        );
      }
      return { kind: 'age_gte', field: rule.field, params: { minAge: params.data.min_age } };
    }
    default:
      throw new ConfigurationError(
        `Unsupported custom validation '${rule.validation}' for field '${rule.field}' in entity '${entity}'.`
      );
  }
}

function buildProjectionSpec(projection: z.infer<typeof projectionSchema>): ProjectionSpec {
  return {
    name: projection.name,
    kind: projection.type,
    definition: projectionDefinition(projection),
    aliases: Object.entries(projection.aliases ?? {})
  };
}

function projectionDefinition(projection: z.infer<typeof projectionSchema>): ProjectionDefinition {
  const text = projection.query?.trim() ?? '';
  if (text.length > 0) {
    return { form: 'query', text };
  }
  if (projection.select !== undefined) {
    return {
      form: 'structured',
      block: {
        select: projection.select,
        where: projection.where,
        order_by: projection.order_by,
        limit: projection.limit,
        distinct: projection.distinct
      }
    };
  }
  return { form: 'empty' };
}

function normalizePolicy(value: EntityConfig['settings']['duplicate_resolution']): DuplicateResolutionPolicy {
  switch (value) {
    case 'first':
    case 'keep_first':
      return 'keep_first';
    case 'last':
    case 'keep_last':
      return 'keep_last';
    case 'exclude_all':
      return 'exclude_all';
  }
}

function assertValidPattern(entity: string, field: string, pattern: string): void {
  try {
    new RegExp(pattern);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid pattern for field '${field}' in entity '${entity}': ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
