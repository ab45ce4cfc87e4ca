/**
 * Graph Materializer
 *
 * Assembles one entity, its attributes and its immediate neighbours into a
 * single nested document. Two strategies produce the same shape: `walk`
 * stitches it together from the stores, `query` has SQLite build the JSON
 * in one statement.
 */

import {
  GraphError,
  type AttributeMap,
  type AttributeScalar,
  type EntityRecord,
  type MaterializedEntity,
  type ModelBlock,
  type ModelTypeRecord,
  type RelationBlock,
  type StoredAttribute,
  type TypeRef,
} from '@graphdoc/shared';
import { toScalar } from './attribute-values.js';
import { read, type Db } from './database.js';
import type { EntityStore } from './entity-store.js';
import type { RelationshipStore } from './relationship-store.js';
import type { TypeRegistry } from './type-registry.js';

export type MaterializerStrategy = 'walk' | 'query';

export class GraphMaterializer {
  constructor(
    private readonly db: Db,
    private readonly registry: TypeRegistry,
    private readonly entities: EntityStore,
    private readonly relations: RelationshipStore
  ) {}

  /**
   * Build the raw document for an entity inside one read snapshot.
   * The result is not yet standardized.
   */
  materialize(entityId: number, strategy: MaterializerStrategy = 'query'): unknown {
    return read(this.db, () => (strategy === 'walk' ? this.walk(entityId) : this.query(entityId)));
  }

  private walk(entityId: number): MaterializedEntity {
    const entity = this.entities.getEntity(entityId);

    const relations = this.relations.listRelations(entityId).map((relation): RelationBlock => {
      const outgoing = relation.fromId === entityId;
      const other = this.entities.getEntity(outgoing ? relation.toId : relation.fromId);

      return {
        relation_id: relation.id,
        relation_name: this.registry.getRelationshipType(relation.relationshipTypeId).name,
        direction: outgoing ? 'outgoing' : 'incoming',
        other_model: this.modelBlock(other),
        relation_attributes: latestValues(this.relations.getRelationAttributeValues(relation.id)),
      };
    });

    return {
      model: this.modelBlock(entity),
      attributes: latestValues(this.entities.getAttributeValues(entityId)),
      relations,
    };
  }

  private modelBlock(entity: EntityRecord): ModelBlock {
    const composition = this.entities.getTypeComposition(entity.id);
    return {
      id: entity.id,
      title: entity.title,
      body: entity.body,
      created_at: entity.createdAt,
      updated_at: entity.updatedAt,
      model_type: {
        base_model: typeRef(composition.base),
        traits: composition.traits.map(typeRef),
      },
    };
  }

  private query(entityId: number): unknown {
    const row = this.db.prepare<unknown[], { document: string }>(DOCUMENT_SQL).get(entityId);
    if (!row) {
      throw new GraphError('EntityNotFound', `Entity ${entityId} not found`, { entityId });
    }
    return JSON.parse(row.document);
  }
}

function typeRef(type: ModelTypeRecord): TypeRef {
  return { id: type.id, name: type.name, description: type.description };
}

/**
 * Collapse stored values into one value per key; values arrive oldest
 * first, so the most recent one wins.
 */
function latestValues(values: StoredAttribute[]): AttributeMap {
  const latest = new Map<string, AttributeScalar>();
  for (const attribute of values) {
    latest.set(attribute.key, toScalar(attribute.value));
  }
  return Object.fromEntries(latest);
}

// ============================================================================
// Single-statement document
// ============================================================================

// JSON values lose their subtype when they leave a subquery, hence the json() wrappers.

function valueJson(alias: string): string {
  return `json(CASE
    WHEN ${alias}.value_text IS NOT NULL THEN json_quote(${alias}.value_text)
    WHEN ${alias}.value_number IS NOT NULL THEN json_quote(${alias}.value_number)
    WHEN ${alias}.value_bool IS NOT NULL THEN CASE ${alias}.value_bool WHEN 1 THEN 'true' ELSE 'false' END
    WHEN ${alias}.value_time IS NOT NULL THEN json_quote(${alias}.value_time)
    ELSE json_quote(${alias}.value_vector)
  END)`;
}

function typeRefJson(alias: string): string {
  return `json_object('id', ${alias}.id, 'name', ${alias}.name, 'description', ${alias}.description)`;
}

function modelJson(alias: string): string {
  return `json_object(
    'id', ${alias}.id,
    'title', ${alias}.title,
    'body', ${alias}.body,
    'created_at', ${alias}.created_at,
    'updated_at', ${alias}.updated_at,
    'model_type', json_object(
      'base_model', json((
        SELECT ${typeRefJson('bt')} FROM model_types bt WHERE bt.id = ${alias}.model_type_id
      )),
      'traits', json((
        SELECT json_group_array(${typeRefJson('tt')} ORDER BY ta.id)
        FROM trait_assignments ta
        JOIN model_types tt ON tt.id = ta.trait_type_id
        WHERE ta.model_id = ${alias}.id
      ))
    )
  )`;
}

const ATTRIBUTES_SQL = `json((
  SELECT json_group_object(ad.key, ${valueJson('a')} ORDER BY a.id)
  FROM attributes a
  JOIN attribute_definitions ad ON ad.id = a.attribute_definition_id
  WHERE a.model_id = m.id
    AND a.id = (
      SELECT MAX(a2.id)
      FROM attributes a2
      JOIN attribute_definitions ad2 ON ad2.id = a2.attribute_definition_id
      WHERE a2.model_id = m.id AND ad2.key = ad.key
    )
))`;

const RELATION_ATTRIBUTES_SQL = `json((
  SELECT json_group_object(rad.key, ${valueJson('ra')} ORDER BY ra.id)
  FROM relation_attributes ra
  JOIN relation_attribute_definitions rad ON rad.id = ra.relation_attribute_definition_id
  WHERE ra.relation_id = r.id
    AND ra.id = (
      SELECT MAX(ra2.id)
      FROM relation_attributes ra2
      JOIN relation_attribute_definitions rad2 ON rad2.id = ra2.relation_attribute_definition_id
      WHERE ra2.relation_id = r.id AND rad2.key = rad.key
    )
))`;

const RELATIONS_SQL = `json((
  SELECT json_group_array(json_object(
    'relation_id', r.id,
    'relation_name', rt.relation_name,
    'direction', CASE WHEN r.from_id = m.id THEN 'outgoing' ELSE 'incoming' END,
    'other_model', ${modelJson('o')},
    'relation_attributes', ${RELATION_ATTRIBUTES_SQL}
  ) ORDER BY r.id)
  FROM relations r
  JOIN relationship_types rt ON rt.id = r.relationship_type_id
  JOIN models o ON o.id = CASE WHEN r.from_id = m.id THEN r.to_id ELSE r.from_id END
  WHERE r.from_id = m.id OR r.to_id = m.id
))`;

const DOCUMENT_SQL = `
  SELECT json_object(
    'model', ${modelJson('m')},
    'attributes', ${ATTRIBUTES_SQL},
    'relations', ${RELATIONS_SQL}
  ) AS document
  FROM models m
  WHERE m.id = ?
`;
