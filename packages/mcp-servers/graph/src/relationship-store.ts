/**
 * Relationship Store
 *
 * Directed, typed edges between entities and the EAV values attached to them.
 */

import { GraphError, now, type RelationRecord, type StoredAttribute } from '@graphdoc/shared';
import { fromColumns, toAttributeValue, toColumns, type ValueColumns } from './attribute-values.js';
import { insertedId, transaction, type Db } from './database.js';
import type { EntityStore } from './entity-store.js';
import type { TypeRegistry } from './type-registry.js';

export class RelationshipStore {
  constructor(
    private readonly db: Db,
    private readonly registry: TypeRegistry,
    private readonly entities: EntityStore
  ) {}

  /**
   * Connect two entities. Their base types must be exactly the ones the
   * relationship type was declared between.
   */
  createRelation(fromId: number, toId: number, relationshipTypeId: number): number {
    return transaction(this.db, () => {
      const from = this.entities.getEntity(fromId);
      const to = this.entities.getEntity(toId);
      const relationshipType = this.registry.findRelationshipType(relationshipTypeId);

      if (!relationshipType) {
        throw new GraphError('UnknownType', `Relationship type ${relationshipTypeId} does not exist`);
      }
      if (from.typeId !== relationshipType.fromTypeId || to.typeId !== relationshipType.toTypeId) {
        throw new GraphError(
          'EndpointTypeMismatch',
          `"${relationshipType.name}" connects type ${relationshipType.fromTypeId} to type ${relationshipType.toTypeId}`,
          {
            relationshipTypeId,
            expected: { from: relationshipType.fromTypeId, to: relationshipType.toTypeId },
            actual: { from: from.typeId, to: to.typeId },
          }
        );
      }

      const result = this.db.prepare(`
        INSERT INTO relations (from_id, to_id, relationship_type_id, created_at)
        VALUES (?, ?, ?, ?)
      `).run(fromId, toId, relationshipTypeId, now());

      return insertedId(result);
    });
  }

  findRelation(id: number): RelationRecord | null {
    const row = this.db.prepare<unknown[], RelationRow>('SELECT * FROM relations WHERE id = ?').get(id);
    return row ? rowToRelation(row) : null;
  }

  getRelation(id: number): RelationRecord {
    const relation = this.findRelation(id);
    if (!relation) throw new GraphError('RelationNotFound', `Relation ${id} not found`, { relationId: id });
    return relation;
  }

  /**
   * Relations where the entity is either endpoint, oldest first
   */
  listRelations(entityId: number): RelationRecord[] {
    const rows = this.db.prepare<unknown[], RelationRow>(`
      SELECT * FROM relations WHERE from_id = ? OR to_id = ? ORDER BY id
    `).all(entityId, entityId);
    return rows.map(rowToRelation);
  }

  deleteRelation(id: number): boolean {
    return transaction(this.db, () => {
      const result = this.db.prepare('DELETE FROM relations WHERE id = ?').run(id);
      return result.changes > 0;
    });
  }

  // ==========================================================================
  // Relation attributes
  // ==========================================================================

  /**
   * Add a value for `key` on a relation, checked against its relationship type's schema
   */
  setRelationAttribute(relationId: number, key: string, raw: unknown): number {
    return transaction(
      this.db,
      () => {
        const relation = this.getRelation(relationId);
        const definition = this.registry.findRelationAttributeDefinition(relation.relationshipTypeId, key);
        if (!definition) {
          throw new GraphError(
            'UnknownAttributeKey',
            `Relationship type ${relation.relationshipTypeId} declares no attribute "${key}"`,
            { relationId, key }
          );
        }

        const columns = toColumns(toAttributeValue(definition, raw));
        const result = this.db.prepare(`
          INSERT INTO relation_attributes (
            relation_id, relation_attribute_definition_id,
            value_text, value_number, value_time, value_bool, value_vector
          ) VALUES (?, ?, ?, ?, ?, ?, ?)
        `).run(
          relationId,
          definition.id,
          columns.value_text,
          columns.value_number,
          columns.value_time,
          columns.value_bool,
          columns.value_vector
        );

        return insertedId(result);
      },
      () => new GraphError('DuplicateValue', `Relation ${relationId} already holds this value for "${key}"`, {
        relationId,
        key,
      })
    );
  }

  /**
   * Stored relation attribute values, oldest first
   */
  getRelationAttributeValues(relationId: number): StoredAttribute[] {
    const rows = this.db.prepare<unknown[], RelationAttributeRow>(`
      SELECT ra.*, rad.key
      FROM relation_attributes ra
      JOIN relation_attribute_definitions rad ON rad.id = ra.relation_attribute_definition_id
      WHERE ra.relation_id = ?
      ORDER BY ra.id
    `).all(relationId);

    return rows.map(row => ({
      id: row.id,
      ownerId: row.relation_id,
      definitionId: row.relation_attribute_definition_id,
      key: row.key,
      value: fromColumns(row),
    }));
  }
}

// Row types for SQLite results
interface RelationRow {
  id: number;
  from_id: number;
  to_id: number;
  relationship_type_id: number;
  created_at: string;
}

interface RelationAttributeRow extends ValueColumns {
  id: number;
  relation_id: number;
  relation_attribute_definition_id: number;
  key: string;
}

function rowToRelation(row: RelationRow): RelationRecord {
  return {
    id: row.id,
    fromId: row.from_id,
    toId: row.to_id,
    relationshipTypeId: row.relationship_type_id,
    createdAt: row.created_at,
  };
}
