/**
 * Type Registry
 *
 * Owns the schema side of the graph: base and trait types, the attribute
 * keys each type declares, relationship types between base types and the
 * attribute schema of each relationship type. Definitions are append-only.
 */

import {
  AttributeConstraints,
  GraphError,
  createLogger,
  type AttributeDefinitionRecord,
  type DefineAttributeInput,
  type DefineRelationAttributeInput,
  type DefineRelationshipTypeInput,
  type DefineTypeInput,
  type ModelTypeRecord,
  type Multiplicity,
  type RelationAttributeDefinitionRecord,
  type RelationshipTypeRecord,
  type TypeKind,
  type ValueType,
} from '@graphdoc/shared';
import { insertedId, transaction, type Db } from './database.js';

const log = createLogger('type-registry');

export class TypeRegistry {
  constructor(private readonly db: Db) {}

  // ==========================================================================
  // Model types
  // ==========================================================================

  defineType(input: DefineTypeInput): number {
    return transaction(
      this.db,
      () => {
        if (input.parentId !== undefined && !this.findType(input.parentId)) {
          throw new GraphError('UnknownType', `Parent type ${input.parentId} does not exist`);
        }

        const result = this.db.prepare(`
          INSERT INTO model_types (name, type_kind, parent_id, description)
          VALUES (?, ?, ?, ?)
        `).run(input.name, input.kind, input.parentId ?? null, input.description ?? null);

        return insertedId(result);
      },
      () => new GraphError('DuplicateName', `Type "${input.name}" already exists`, { name: input.name })
    );
  }

  findType(id: number): ModelTypeRecord | null {
    const row = this.db.prepare<unknown[], TypeRow>('SELECT * FROM model_types WHERE id = ?').get(id);
    return row ? rowToType(row) : null;
  }

  getType(id: number): ModelTypeRecord {
    const type = this.findType(id);
    if (!type) throw new GraphError('NotFound', `Type ${id} not found`);
    return type;
  }

  findTypeByName(name: string): ModelTypeRecord | null {
    const row = this.db.prepare<unknown[], TypeRow>('SELECT * FROM model_types WHERE name = ?').get(name);
    return row ? rowToType(row) : null;
  }

  getTypeByName(name: string): ModelTypeRecord {
    const type = this.findTypeByName(name);
    if (!type) throw new GraphError('NotFound', `Type "${name}" not found`);
    return type;
  }

  listTypes(kind?: TypeKind): ModelTypeRecord[] {
    const rows = kind
      ? this.db.prepare<unknown[], TypeRow>('SELECT * FROM model_types WHERE type_kind = ? ORDER BY id').all(kind)
      : this.db.prepare<unknown[], TypeRow>('SELECT * FROM model_types ORDER BY id').all();
    return rows.map(rowToType);
  }

  // ==========================================================================
  // Attribute definitions
  // ==========================================================================

  defineAttribute(input: DefineAttributeInput): number {
    return transaction(
      this.db,
      () => {
        if (!this.findType(input.typeId)) {
          throw new GraphError('UnknownType', `Type ${input.typeId} does not exist`);
        }

        const result = this.db.prepare(`
          INSERT INTO attribute_definitions (model_type_id, key, value_type, required, constraints)
          VALUES (?, ?, ?, ?, ?)
        `).run(
          input.typeId,
          input.key,
          input.valueType,
          input.required ? 1 : 0,
          JSON.stringify(checkConstraints(input.key, input.constraints))
        );

        return insertedId(result);
      },
      () => new GraphError('DuplicateKey', `Type ${input.typeId} already declares "${input.key}"`, {
        typeId: input.typeId,
        key: input.key,
      })
    );
  }

  findAttributeDefinition(typeId: number, key: string): AttributeDefinitionRecord | null {
    const row = this.db.prepare<unknown[], DefinitionRow>(`
      SELECT id, model_type_id AS owner_id, key, value_type, required, constraints
      FROM attribute_definitions WHERE model_type_id = ? AND key = ?
    `).get(typeId, key);
    return row ? rowToAttributeDefinition(row) : null;
  }

  getAttributeDefinition(typeId: number, key: string): AttributeDefinitionRecord {
    const definition = this.findAttributeDefinition(typeId, key);
    if (!definition) throw new GraphError('NotFound', `Type ${typeId} has no attribute "${key}"`);
    return definition;
  }

  /**
   * Attribute definitions declared by any of `typeIds`
   */
  listAttributeDefinitions(typeIds: number[]): AttributeDefinitionRecord[] {
    if (typeIds.length === 0) return [];

    const rows = this.db.prepare<unknown[], DefinitionRow>(`
      SELECT id, model_type_id AS owner_id, key, value_type, required, constraints
      FROM attribute_definitions
      WHERE model_type_id IN (${typeIds.map(() => '?').join(',')})
      ORDER BY id
    `).all(...typeIds);
    return rows.map(rowToAttributeDefinition);
  }

  // ==========================================================================
  // Relationship types
  // ==========================================================================

  defineRelationshipType(input: DefineRelationshipTypeInput): number {
    return transaction(
      this.db,
      () => {
        for (const typeId of [input.fromTypeId, input.toTypeId]) {
          const type = this.findType(typeId);
          if (!type) {
            throw new GraphError('UnknownType', `Type ${typeId} does not exist`);
          }
          if (type.kind !== 'base') {
            throw new GraphError('InvalidBaseType', `Relationships connect base types; "${type.name}" is a trait`);
          }
        }

        const result = this.db.prepare(`
          INSERT INTO relationship_types
            (from_model_type_id, to_model_type_id, relation_name, multiplicity, description)
          VALUES (?, ?, ?, ?, ?)
        `).run(
          input.fromTypeId,
          input.toTypeId,
          input.name,
          input.multiplicity ?? 'many',
          input.description ?? null
        );

        return insertedId(result);
      },
      () => new GraphError('DuplicateName', `Relationship type "${input.name}" already exists between these types`, {
        fromTypeId: input.fromTypeId,
        toTypeId: input.toTypeId,
        name: input.name,
      })
    );
  }

  findRelationshipType(id: number): RelationshipTypeRecord | null {
    const row = this.db.prepare<unknown[], RelationshipTypeRow>('SELECT * FROM relationship_types WHERE id = ?').get(id);
    return row ? rowToRelationshipType(row) : null;
  }

  getRelationshipType(id: number): RelationshipTypeRecord {
    const relationshipType = this.findRelationshipType(id);
    if (!relationshipType) throw new GraphError('NotFound', `Relationship type ${id} not found`);
    return relationshipType;
  }

  getRelationshipTypeByName(fromTypeId: number, toTypeId: number, name: string): RelationshipTypeRecord {
    const row = this.db.prepare<unknown[], RelationshipTypeRow>(`
      SELECT * FROM relationship_types
      WHERE from_model_type_id = ? AND to_model_type_id = ? AND relation_name = ?
    `).get(fromTypeId, toTypeId, name);
    if (!row) throw new GraphError('NotFound', `Relationship type "${name}" not found`);
    return rowToRelationshipType(row);
  }

  /**
   * Every relationship type with this name, whatever its endpoints
   */
  findRelationshipTypes(name: string): RelationshipTypeRecord[] {
    const rows = this.db.prepare<unknown[], RelationshipTypeRow>(
      'SELECT * FROM relationship_types WHERE relation_name = ? ORDER BY id'
    ).all(name);
    return rows.map(rowToRelationshipType);
  }

  // ==========================================================================
  // Relation attribute definitions
  // ==========================================================================

  defineRelationAttribute(input: DefineRelationAttributeInput): number {
    return transaction(
      this.db,
      () => {
        if (!this.findRelationshipType(input.relationshipTypeId)) {
          throw new GraphError('UnknownType', `Relationship type ${input.relationshipTypeId} does not exist`);
        }

        const result = this.db.prepare(`
          INSERT INTO relation_attribute_definitions
            (relationship_type_id, key, value_type, required, constraints)
          VALUES (?, ?, ?, ?, ?)
        `).run(
          input.relationshipTypeId,
          input.key,
          input.valueType,
          input.required ? 1 : 0,
          JSON.stringify(checkConstraints(input.key, input.constraints))
        );

        return insertedId(result);
      },
      () => new GraphError('DuplicateKey', `Relationship type ${input.relationshipTypeId} already declares "${input.key}"`, {
        relationshipTypeId: input.relationshipTypeId,
        key: input.key,
      })
    );
  }

  findRelationAttributeDefinition(relationshipTypeId: number, key: string): RelationAttributeDefinitionRecord | null {
    const row = this.db.prepare<unknown[], DefinitionRow>(`
      SELECT id, relationship_type_id AS owner_id, key, value_type, required, constraints
      FROM relation_attribute_definitions WHERE relationship_type_id = ? AND key = ?
    `).get(relationshipTypeId, key);
    return row ? rowToRelationAttributeDefinition(row) : null;
  }

  getRelationAttributeDefinition(relationshipTypeId: number, key: string): RelationAttributeDefinitionRecord {
    const definition = this.findRelationAttributeDefinition(relationshipTypeId, key);
    if (!definition) {
      throw new GraphError('NotFound', `Relationship type ${relationshipTypeId} has no attribute "${key}"`);
    }
    return definition;
  }
}

// ============================================================================
// Row mapping
// ============================================================================

interface TypeRow {
  id: number;
  name: string;
  parent_id: number | null;
  type_kind: TypeKind;
  description: string | null;
}

interface DefinitionRow {
  id: number;
  owner_id: number;
  key: string;
  value_type: ValueType;
  required: number;
  constraints: string;
}

interface RelationshipTypeRow {
  id: number;
  from_model_type_id: number;
  to_model_type_id: number;
  relation_name: string;
  multiplicity: Multiplicity;
  description: string | null;
}

function rowToType(row: TypeRow): ModelTypeRecord {
  return {
    id: row.id,
    name: row.name,
    kind: row.type_kind,
    parentId: row.parent_id,
    description: row.description,
  };
}

function checkConstraints(key: string, constraints: unknown): AttributeConstraints {
  const result = AttributeConstraints.safeParse(constraints ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new GraphError('ConstraintViolation', `Attribute "${key}": ${issue.path.join('.')}: ${issue.message}`, { key });
  }
  return result.data;
}

function parseConstraints(text: string, owner: string): AttributeConstraints {
  const result = AttributeConstraints.safeParse(JSON.parse(text));
  if (!result.success) {
    log.warn(`${owner} has unreadable constraints, not enforcing them`);
    return {};
  }
  return result.data;
}

function rowToAttributeDefinition(row: DefinitionRow): AttributeDefinitionRecord {
  return {
    id: row.id,
    typeId: row.owner_id,
    key: row.key,
    valueType: row.value_type,
    required: row.required === 1,
    constraints: parseConstraints(row.constraints, `Attribute "${row.key}" of type ${row.owner_id}`),
  };
}

function rowToRelationAttributeDefinition(row: DefinitionRow): RelationAttributeDefinitionRecord {
  return {
    id: row.id,
    relationshipTypeId: row.owner_id,
    key: row.key,
    valueType: row.value_type,
    required: row.required === 1,
    constraints: parseConstraints(row.constraints, `Relation attribute "${row.key}" of relationship type ${row.owner_id}`),
  };
}

function rowToRelationshipType(row: RelationshipTypeRow): RelationshipTypeRecord {
  return {
    id: row.id,
    fromTypeId: row.from_model_type_id,
    toTypeId: row.to_model_type_id,
    name: row.relation_name,
    multiplicity: row.multiplicity,
    description: row.description,
  };
}
