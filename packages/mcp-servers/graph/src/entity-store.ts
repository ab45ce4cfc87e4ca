/**
 * Entity Store
 *
 * Entities, their trait compositions, their typed EAV attribute values and
 * their opaque embeddings. Every write is checked against the type registry
 * inside the same transaction as the insert.
 */

import {
  GraphError,
  now,
  type AttributeDefinitionRecord,
  type CreateEntityInput,
  type EmbeddingRecord,
  type EntityRecord,
  type ModelTypeRecord,
  type StoredAttribute,
  type UpdateEntityInput,
} from '@graphdoc/shared';
import { fromColumns, toAttributeValue, toColumns, type ValueColumns } from './attribute-values.js';
import { insertedId, transaction, type Db } from './database.js';
import type { TypeRegistry } from './type-registry.js';

export interface TypeComposition {
  base: ModelTypeRecord;
  traits: ModelTypeRecord[];  // In assignment order
}

export interface ListEntitiesOptions {
  typeName?: string;
  title?: string;
  limit?: number;
}

export class EntityStore {
  constructor(
    private readonly db: Db,
    private readonly registry: TypeRegistry
  ) {}

  /**
   * Create an entity of a base type
   */
  createEntity(input: CreateEntityInput): number {
    return transaction(this.db, () => {
      const type = this.registry.findType(input.baseTypeId);
      if (!type) {
        throw new GraphError('UnknownType', `Type ${input.baseTypeId} does not exist`);
      }
      if (type.kind !== 'base') {
        throw new GraphError('InvalidBaseType', `"${type.name}" is a trait and cannot be an entity's base type`);
      }

      const timestamp = now();
      const result = this.db.prepare(`
        INSERT INTO models (model_type_id, title, body, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?)
      `).run(type.id, input.title, input.body ?? null, timestamp, timestamp);

      return insertedId(result);
    });
  }

  findEntity(id: number): EntityRecord | null {
    const row = this.db.prepare<unknown[], EntityRow>('SELECT * FROM models WHERE id = ?').get(id);
    return row ? rowToEntity(row) : null;
  }

  getEntity(id: number): EntityRecord {
    const entity = this.findEntity(id);
    if (!entity) throw new GraphError('EntityNotFound', `Entity ${id} not found`, { entityId: id });
    return entity;
  }

  /**
   * List entities, optionally by base type name and exact title
   */
  listEntities(options: ListEntitiesOptions = {}): EntityRecord[] {
    let sql = 'SELECT m.* FROM models m JOIN model_types mt ON mt.id = m.model_type_id WHERE 1=1';
    const params: unknown[] = [];

    if (options.typeName) {
      sql += ' AND mt.name = ?';
      params.push(options.typeName);
    }

    if (options.title) {
      sql += ' AND m.title = ?';
      params.push(options.title);
    }

    sql += ' ORDER BY m.id';

    if (options.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(options.limit);
    }

    return this.db.prepare<unknown[], EntityRow>(sql).all(...params).map(rowToEntity);
  }

  updateEntity(id: number, changes: UpdateEntityInput): EntityRecord {
    return transaction(this.db, () => {
      const entity = this.getEntity(id);
      const title = changes.title ?? entity.title;
      const body = changes.body === undefined ? entity.body : changes.body;

      this.db.prepare('UPDATE models SET title = ?, body = ?, updated_at = ? WHERE id = ?')
        .run(title, body, now(), id);

      return this.getEntity(id);
    });
  }

  /**
   * Delete an entity; traits, attributes, embedding and incident relations go with it
   */
  deleteEntity(id: number): boolean {
    return transaction(this.db, () => {
      const result = this.db.prepare('DELETE FROM models WHERE id = ?').run(id);
      return result.changes > 0;
    });
  }

  // ==========================================================================
  // Traits
  // ==========================================================================

  /**
   * Give an entity an additional trait type. A repeat assignment is caught
   * by the unique constraint, so concurrent writers cannot both succeed.
   */
  assignTrait(entityId: number, traitTypeId: number): void {
    transaction(
      this.db,
      () => {
        this.getEntity(entityId);
        const trait = this.registry.findType(traitTypeId);
        if (!trait) {
          throw new GraphError('UnknownType', `Type ${traitTypeId} does not exist`);
        }
        if (trait.kind !== 'trait') {
          throw new GraphError('InvalidTraitType', `"${trait.name}" is a base type, not a trait`);
        }

        this.db.prepare(`
          INSERT INTO trait_assignments (model_id, trait_type_id, applied_at)
          VALUES (?, ?, ?)
        `).run(entityId, traitTypeId, now());
      },
      () => new GraphError('DuplicateTraitAssignment', `Entity ${entityId} already has trait ${traitTypeId}`, {
        entityId,
        traitTypeId,
      })
    );
  }

  /**
   * Base type plus assigned traits
   */
  getTypeComposition(entityId: number): TypeComposition {
    const entity = this.getEntity(entityId);
    const traits = this.db.prepare<unknown[], { trait_type_id: number }>(
      'SELECT trait_type_id FROM trait_assignments WHERE model_id = ? ORDER BY id'
    ).all(entityId);

    return {
      base: this.registry.getType(entity.typeId),
      traits: traits.map(row => this.registry.getType(row.trait_type_id)),
    };
  }

  // ==========================================================================
  // Attributes
  // ==========================================================================

  /**
   * Add a value for `key`. Values accumulate: setting the same key again adds
   * a second value rather than replacing the first.
   */
  setAttribute(entityId: number, key: string, raw: unknown): number {
    return transaction(
      this.db,
      () => {
        const definition = this.resolveDefinition(entityId, key);
        const columns = toColumns(toAttributeValue(definition, raw));

        const result = this.db.prepare(`
          INSERT INTO attributes (
            model_id, attribute_definition_id,
            value_text, value_number, value_time, value_bool, value_vector
          ) VALUES (?, ?, ?, ?, ?, ?, ?)
        `).run(
          entityId,
          definition.id,
          columns.value_text,
          columns.value_number,
          columns.value_time,
          columns.value_bool,
          columns.value_vector
        );

        this.touch(entityId);
        return insertedId(result);
      },
      () => new GraphError('DuplicateValue', `Entity ${entityId} already holds this value for "${key}"`, {
        entityId,
        key,
      })
    );
  }

  /**
   * Stored values, oldest first; all keys unless `key` is given
   */
  getAttributeValues(entityId: number, key?: string): StoredAttribute[] {
    let sql = `
      SELECT a.*, ad.key
      FROM attributes a
      JOIN attribute_definitions ad ON ad.id = a.attribute_definition_id
      WHERE a.model_id = ?
    `;
    const params: unknown[] = [entityId];

    if (key !== undefined) {
      sql += ' AND ad.key = ?';
      params.push(key);
    }

    sql += ' ORDER BY a.id';

    return this.db.prepare<unknown[], AttributeRow>(sql).all(...params).map(row => ({
      id: row.id,
      ownerId: row.model_id,
      definitionId: row.attribute_definition_id,
      key: row.key,
      value: fromColumns(row),
    }));
  }

  removeAttributeValue(attributeId: number): boolean {
    return transaction(this.db, () => {
      const row = this.db.prepare<unknown[], { model_id: number }>(
        'SELECT model_id FROM attributes WHERE id = ?'
      ).get(attributeId);
      if (!row) return false;

      this.db.prepare('DELETE FROM attributes WHERE id = ?').run(attributeId);
      this.touch(row.model_id);
      return true;
    });
  }

  // ==========================================================================
  // Embeddings
  // ==========================================================================

  /**
   * Store the entity's embedding. The payload is never interpreted.
   */
  setEmbedding(entityId: number, embedding: number[] | string, model?: string): void {
    transaction(this.db, () => {
      this.getEntity(entityId);
      const payload = typeof embedding === 'string' ? embedding : JSON.stringify(embedding);

      this.db.prepare(`
        INSERT OR REPLACE INTO embeddings (model_id, embedding, model, updated_at)
        VALUES (?, ?, ?, ?)
      `).run(entityId, payload, model ?? null, now());
    });
  }

  getEmbedding(entityId: number): EmbeddingRecord | null {
    const row = this.db.prepare<unknown[], EmbeddingRow>('SELECT * FROM embeddings WHERE model_id = ?').get(entityId);
    return row
      ? { entityId: row.model_id, embedding: row.embedding, model: row.model, updatedAt: row.updated_at }
      : null;
  }

  // ==========================================================================
  // Private helpers
  // ==========================================================================

  /**
   * Find the definition of `key` in the entity's composition: the base type
   * wins, then traits in the order they were assigned.
   */
  private resolveDefinition(entityId: number, key: string): AttributeDefinitionRecord {
    const composition = this.getTypeComposition(entityId);

    for (const type of [composition.base, ...composition.traits]) {
      const definition = this.registry.findAttributeDefinition(type.id, key);
      if (definition) return definition;
    }

    throw new GraphError(
      'UnknownAttributeKey',
      `No type of entity ${entityId} declares an attribute "${key}"`,
      { entityId, key, types: [composition.base.name, ...composition.traits.map(t => t.name)] }
    );
  }

  private touch(entityId: number): void {
    this.db.prepare('UPDATE models SET updated_at = ? WHERE id = ?').run(now(), entityId);
  }
}

// Row types for SQLite results
interface EntityRow {
  id: number;
  model_type_id: number;
  title: string;
  body: string | null;
  created_at: string;
  updated_at: string;
}

interface AttributeRow extends ValueColumns {
  id: number;
  model_id: number;
  attribute_definition_id: number;
  key: string;
}

interface EmbeddingRow {
  model_id: number;
  embedding: string;
  model: string | null;
  updated_at: string;
}

function rowToEntity(row: EntityRow): EntityRecord {
  return {
    id: row.id,
    typeId: row.model_type_id,
    title: row.title,
    body: row.body,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
