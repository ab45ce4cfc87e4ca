/**
 * graphdoc Shared Types
 *
 * Type registry vocabulary and the canonical shapes returned by materialization.
 */

import { z } from 'zod';

// ============================================================================
// Type Registry
// ============================================================================

/**
 * A base type is an entity's primary classification; traits are additive
 */
export const TypeKind = z.enum(['base', 'trait']);
export type TypeKind = z.infer<typeof TypeKind>;

/**
 * Declared value type of an attribute definition
 */
export const ValueType = z.enum([
  'string',
  'number',
  'datetime',
  'boolean',
  'vector',   // Opaque text, never interpreted
]);
export type ValueType = z.infer<typeof ValueType>;

export const Multiplicity = z.enum(['one', 'many']);
export type Multiplicity = z.infer<typeof Multiplicity>;

function isRegExp(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

/**
 * Optional structural constraints on an attribute definition
 */
export const AttributeConstraints = z.object({
  minLength: z.number().int().min(0).optional(),
  maxLength: z.number().int().min(0).optional(),
  pattern: z.string().refine(isRegExp, { message: 'Not a valid regular expression' }).optional(),
  enum: z.array(z.string()).min(1).optional(),
  min: z.number().optional(),
  max: z.number().optional(),
  integer: z.boolean().optional(),
  dimensions: z.number().int().positive().optional(),
}).strict();
export type AttributeConstraints = z.infer<typeof AttributeConstraints>;

export interface ModelTypeRecord {
  id: number;
  name: string;
  kind: TypeKind;
  parentId: number | null;
  description: string | null;
}

export interface AttributeDefinitionRecord {
  id: number;
  typeId: number;
  key: string;
  valueType: ValueType;
  required: boolean;
  constraints: AttributeConstraints;
}

export interface RelationshipTypeRecord {
  id: number;
  fromTypeId: number;
  toTypeId: number;
  name: string;
  multiplicity: Multiplicity;
  description: string | null;
}

export interface RelationAttributeDefinitionRecord {
  id: number;
  relationshipTypeId: number;
  key: string;
  valueType: ValueType;
  required: boolean;
  constraints: AttributeConstraints;
}

// ============================================================================
// Instances
// ============================================================================

/**
 * A typed attribute value. The variant tag is the declared value type;
 * storage maps each variant onto exactly one column.
 */
export type AttributeValue =
  | { type: 'string'; value: string }
  | { type: 'number'; value: number }
  | { type: 'datetime'; value: string }
  | { type: 'boolean'; value: boolean }
  | { type: 'vector'; value: string };

export type AttributeScalar = string | number | boolean | null;

export interface EntityRecord {
  id: number;
  typeId: number;
  title: string;
  body: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface StoredAttribute {
  id: number;
  ownerId: number;  // Entity or relation the value belongs to
  definitionId: number;
  key: string;
  value: AttributeValue;
}

export interface RelationRecord {
  id: number;
  fromId: number;
  toId: number;
  relationshipTypeId: number;
  createdAt: string;
}

export interface EmbeddingRecord {
  entityId: number;
  embedding: string;
  model: string | null;
  updatedAt: string;
}

// ============================================================================
// Canonical Shapes (materialization output)
// ============================================================================

export const ShapeTag = z.enum(['model_type', 'model', 'model_full']);
export type ShapeTag = z.infer<typeof ShapeTag>;

export const Direction = z.enum(['incoming', 'outgoing']);
export type Direction = z.infer<typeof Direction>;

export const AttributeScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const TypeRef = z.object({
  id: z.number(),
  name: z.string(),
  description: z.string().nullable(),
}).strict();
export type TypeRef = z.infer<typeof TypeRef>;

export const ModelTypeBlock = z.object({
  base_model: TypeRef,
  traits: z.array(TypeRef),
}).strict();
export type ModelTypeBlock = z.infer<typeof ModelTypeBlock>;

export const ModelBlock = z.object({
  id: z.number(),
  title: z.string(),
  body: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  model_type: ModelTypeBlock,
}).strict();
export type ModelBlock = z.infer<typeof ModelBlock>;

export const AttributeMap = z.record(AttributeScalarSchema);
export type AttributeMap = z.infer<typeof AttributeMap>;

export const RelationBlock = z.object({
  relation_id: z.number(),
  relation_name: z.string(),
  direction: Direction,
  other_model: ModelBlock,
  relation_attributes: AttributeMap,
}).strict();
export type RelationBlock = z.infer<typeof RelationBlock>;

export const MaterializedEntity = z.object({
  model: ModelBlock,
  attributes: AttributeMap,
  relations: z.array(RelationBlock),
}).strict();
export type MaterializedEntity = z.infer<typeof MaterializedEntity>;

export interface CanonicalShapes {
  model_type: ModelTypeBlock;
  model: ModelBlock;
  model_full: MaterializedEntity;
}

// ============================================================================
// Write Operations
// ============================================================================

export const DefineTypeInput = z.object({
  name: z.string().min(1),
  kind: TypeKind,
  parentId: z.number().int().positive().optional(),
  description: z.string().optional(),
});
export type DefineTypeInput = z.infer<typeof DefineTypeInput>;

export const DefineAttributeInput = z.object({
  typeId: z.number().int().positive(),
  key: z.string().min(1),
  valueType: ValueType,
  required: z.boolean().default(false),
  constraints: AttributeConstraints.optional(),
});
export type DefineAttributeInput = z.input<typeof DefineAttributeInput>;

export const DefineRelationshipTypeInput = z.object({
  fromTypeId: z.number().int().positive(),
  toTypeId: z.number().int().positive(),
  name: z.string().min(1),
  multiplicity: Multiplicity.default('many'),
  description: z.string().optional(),
});
export type DefineRelationshipTypeInput = z.input<typeof DefineRelationshipTypeInput>;

export const DefineRelationAttributeInput = z.object({
  relationshipTypeId: z.number().int().positive(),
  key: z.string().min(1),
  valueType: ValueType,
  required: z.boolean().default(false),
  constraints: AttributeConstraints.optional(),
});
export type DefineRelationAttributeInput = z.input<typeof DefineRelationAttributeInput>;

export const CreateEntityInput = z.object({
  baseTypeId: z.number().int().positive(),
  title: z.string().min(1),
  body: z.string().optional(),
});
export type CreateEntityInput = z.infer<typeof CreateEntityInput>;

export const UpdateEntityInput = z.object({
  title: z.string().min(1).optional(),
  body: z.string().nullable().optional(),
});
export type UpdateEntityInput = z.infer<typeof UpdateEntityInput>;

/**
 * Raw value accepted by setAttribute; checked against the definition's value type
 */
export const RawAttributeValue = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.date(),
  z.array(z.number()),
]);
export type RawAttributeValue = z.infer<typeof RawAttributeValue>;
