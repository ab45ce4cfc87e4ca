/**
 * Response Standardizer
 *
 * Re-shapes anything that claims to be a materialized entity (or one of its
 * nested blocks) into the canonical shape. Never throws: missing fields get
 * typed defaults, malformed children are dropped, unknown keys are stripped,
 * and each deviation is logged.
 */

import { z } from 'zod';
import { createLogger } from './logger.js';
import {
  AttributeScalarSchema,
  Direction,
  MaterializedEntity,
  ModelBlock,
  ModelTypeBlock,
  type AttributeMap,
  type AttributeScalar,
  type CanonicalShapes,
  type RelationBlock,
  type ShapeTag,
  type TypeRef,
} from './types.js';

const log = createLogger('standardize');

type UnknownRecord = Record<string, unknown>;

const Id = z.number().int();
const Text = z.string();
const NullableText = z.string().nullable();
const Timestamp = z.union([z.string(), z.date().transform((date) => date.toISOString())]);

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Read one field, falling back to a default when it is absent or invalid.
 */
function field<T>(
  record: UnknownRecord,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: () => T,
  path: string
): T {
  const result = schema.safeParse(record[key]);
  if (result.success) return result.data;

  const state = key in record ? `invalid (${describe(record[key])})` : 'missing';
  log.warn(`${path}.${key} ${state}, using default`);
  return fallback();
}

// ─── Blocks ──────────────────────────────────────────────────────────────────

function defaultTypeRef(): TypeRef {
  return { id: 0, name: 'Unknown', description: null };
}

function defaultModel(): ModelBlock {
  const timestamp = new Date().toISOString();
  return {
    id: 0,
    title: 'Unknown',
    body: null,
    created_at: timestamp,
    updated_at: timestamp,
    model_type: { base_model: defaultTypeRef(), traits: [] },
  };
}

function standardizeTypeRef(raw: unknown, path: string): TypeRef {
  if (!isRecord(raw)) {
    log.warn(`${path} is ${describe(raw)}, using default`);
    return defaultTypeRef();
  }
  return {
    id: field(raw, 'id', Id, () => 0, path),
    name: field(raw, 'name', Text, () => 'Unknown', path),
    description: field(raw, 'description', NullableText, () => null, path),
  };
}

/**
 * A trait without a usable id and name cannot be shown at all.
 */
function standardizeTrait(raw: unknown, path: string): TypeRef | null {
  if (!isRecord(raw) || !Id.safeParse(raw.id).success || !Text.safeParse(raw.name).success) {
    log.warn(`${path} dropped: trait needs a numeric id and a name`);
    return null;
  }
  return standardizeTypeRef(raw, path);
}

export function standardizeModelType(raw: unknown): ModelTypeBlock {
  const path = 'model_type';
  if (!isRecord(raw)) {
    log.warn(`${path} is ${describe(raw)}, using default`);
    return { base_model: defaultTypeRef(), traits: [] };
  }

  const base_model = standardizeTypeRef(raw.base_model, `${path}.base_model`);

  let traits: TypeRef[] = [];
  if (Array.isArray(raw.traits)) {
    traits = raw.traits
      .map((trait, index) => standardizeTrait(trait, `${path}.traits[${index}]`))
      .filter((trait): trait is TypeRef => trait !== null);
  } else {
    log.warn(`${path}.traits ${'traits' in raw ? 'not a list' : 'missing'}, using []`);
  }

  return { base_model, traits };
}

export function standardizeModel(raw: unknown, path = 'model'): ModelBlock {
  if (!isRecord(raw)) {
    log.warn(`${path} is ${describe(raw)}, using default`);
    return defaultModel();
  }

  const now = () => new Date().toISOString();
  return {
    id: field(raw, 'id', Id, () => 0, path),
    title: field(raw, 'title', Text, () => 'Unknown', path),
    body: field(raw, 'body', NullableText, () => null, path),
    created_at: field(raw, 'created_at', Timestamp, now, path),
    updated_at: field(raw, 'updated_at', Timestamp, now, path),
    model_type: standardizeModelType(raw.model_type),
  };
}

function standardizeAttributes(raw: unknown, path: string): AttributeMap {
  if (!isRecord(raw)) {
    // null is how an empty aggregate comes back from some stores; not worth a warning
    if (raw !== null) log.warn(`${path} is ${describe(raw)}, using {}`);
    return {};
  }

  const attributes: Array<[string, AttributeScalar]> = [];
  for (const [key, value] of Object.entries(raw)) {
    const result = AttributeScalarSchema.safeParse(value);
    if (result.success) {
      attributes.push([key, result.data]);
    } else {
      log.warn(`${path}.${key} dropped: ${describe(value)} is not a scalar`);
    }
  }
  return Object.fromEntries(attributes);
}

function standardizeRelation(raw: unknown, path: string): RelationBlock | null {
  if (!isRecord(raw)) {
    log.warn(`${path} dropped: ${describe(raw)}`);
    return null;
  }

  const id = Id.safeParse(raw.relation_id);
  const direction = Direction.safeParse(raw.direction);
  if (!id.success || !direction.success) {
    log.warn(`${path} dropped: relation needs a numeric relation_id and a direction`);
    return null;
  }

  return {
    relation_id: id.data,
    relation_name: field(raw, 'relation_name', Text, () => 'Unknown', path),
    direction: direction.data,
    other_model: standardizeModel(raw.other_model, `${path}.other_model`),
    relation_attributes: standardizeAttributes(raw.relation_attributes, `${path}.relation_attributes`),
  };
}

export function standardizeModelFull(raw: unknown): MaterializedEntity {
  if (!isRecord(raw)) {
    log.warn(`model_full is ${describe(raw)}, using default`);
    return { model: defaultModel(), attributes: {}, relations: [] };
  }

  let relations: RelationBlock[] = [];
  if (Array.isArray(raw.relations)) {
    relations = raw.relations
      .map((relation, index) => standardizeRelation(relation, `relations[${index}]`))
      .filter((relation): relation is RelationBlock => relation !== null);
  } else if (raw.relations !== null) {
    log.warn(`relations ${'relations' in raw ? 'not a list' : 'missing'}, using []`);
  }

  return {
    model: standardizeModel(raw.model),
    attributes: standardizeAttributes(raw.attributes, 'attributes'),
    relations,
  };
}

// ─── Tag Dispatch ────────────────────────────────────────────────────────────

const standardizers: { [K in ShapeTag]: (raw: unknown) => CanonicalShapes[K] } = {
  model_type: standardizeModelType,
  model: (raw) => standardizeModel(raw),
  model_full: standardizeModelFull,
};

/**
 * Coerce any value into the canonical shape for `tag`.
 */
export function standardize<T extends ShapeTag>(tag: T, raw: unknown): CanonicalShapes[T] {
  return standardizers[tag](raw);
}

const validators: Record<ShapeTag, z.ZodTypeAny> = {
  model_type: ModelTypeBlock,
  model: ModelBlock,
  model_full: MaterializedEntity,
};

/**
 * Check whether `value` already has the canonical shape for `tag`.
 * Does not modify the value.
 */
export function validate(tag: ShapeTag, value: unknown): boolean {
  const result = validators[tag].safeParse(value);

  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    log.warn(`Invalid ${tag} structure at ${where}: ${issue?.message ?? 'unknown issue'}`);
    return false;
  }

  log.debug(`Valid ${tag} structure`);
  return true;
}
