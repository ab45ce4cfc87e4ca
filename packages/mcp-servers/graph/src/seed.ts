/**
 * Declarative graph seeding
 *
 * Loads types, attribute schemas, relationship types, entities and relations
 * described by name into a graph in one transaction. Entities are referred to
 * by a local `ref` so relations can point at them before ids exist.
 */

import { z } from 'zod';
import { AttributeConstraints, GraphError, Multiplicity, TypeKind, ValueType, createLogger } from '@graphdoc/shared';
import type { GraphService } from './graph-service.js';

const log = createLogger('seed');

const SeedAttributeDefinition = z.object({
  key: z.string().min(1),
  valueType: ValueType,
  required: z.boolean().optional(),
  constraints: AttributeConstraints.optional(),
});

const SeedValue = z.object({
  key: z.string().min(1),
  value: z.union([z.string(), z.number(), z.boolean(), z.array(z.number())]),
});

export const SeedData = z.object({
  types: z.array(z.object({
    name: z.string().min(1),
    kind: TypeKind,
    parent: z.string().optional(),
    description: z.string().optional(),
    attributes: z.array(SeedAttributeDefinition).default([]),
  })).default([]),
  relationshipTypes: z.array(z.object({
    from: z.string().min(1),
    to: z.string().min(1),
    name: z.string().min(1),
    multiplicity: Multiplicity.optional(),
    description: z.string().optional(),
    attributes: z.array(SeedAttributeDefinition).default([]),
  })).default([]),
  entities: z.array(z.object({
    ref: z.string().min(1),
    type: z.string().min(1),
    title: z.string().min(1),
    body: z.string().optional(),
    traits: z.array(z.string()).default([]),
    attributes: z.array(SeedValue).default([]),  // Repeating a key adds another value
  })).default([]),
  relations: z.array(z.object({
    from: z.string().min(1),
    to: z.string().min(1),
    name: z.string().min(1),
    attributes: z.array(SeedValue).default([]),
  })).default([]),
});
export type SeedData = z.input<typeof SeedData>;

export interface SeedResult {
  typeIds: Record<string, number>;
  entityIds: Record<string, number>;
  relationIds: number[];
}

/**
 * Load a graph description. Nothing is written unless all of it loads.
 */
export function seedGraph(service: GraphService, input: unknown): SeedResult {
  const data = SeedData.parse(input);

  return service.transaction(() => {
    const typeIds = new Map<string, number>();
    const entityIds = new Map<string, number>();
    const relationIds: number[] = [];

    const typeId = (name: string): number => typeIds.get(name) ?? service.types.getTypeByName(name).id;
    const entityId = (ref: string): number => {
      const id = entityIds.get(ref);
      if (id === undefined) {
        throw new GraphError('EntityNotFound', `Unknown entity reference "${ref}"`, { ref });
      }
      return id;
    };

    for (const type of data.types) {
      const id = service.defineType({
        name: type.name,
        kind: type.kind,
        parentId: type.parent === undefined ? undefined : typeId(type.parent),
        description: type.description,
      });
      typeIds.set(type.name, id);

      for (const attribute of type.attributes) {
        service.defineAttribute({ typeId: id, ...attribute });
      }
    }

    for (const relationshipType of data.relationshipTypes) {
      const id = service.defineRelationshipType({
        fromTypeId: typeId(relationshipType.from),
        toTypeId: typeId(relationshipType.to),
        name: relationshipType.name,
        multiplicity: relationshipType.multiplicity,
        description: relationshipType.description,
      });

      for (const attribute of relationshipType.attributes) {
        service.defineRelationAttribute({ relationshipTypeId: id, ...attribute });
      }
    }

    for (const entity of data.entities) {
      const id = service.createEntity({ baseTypeId: typeId(entity.type), title: entity.title, body: entity.body });
      entityIds.set(entity.ref, id);

      for (const trait of entity.traits) {
        service.assignTrait(id, typeId(trait));
      }
      for (const { key, value } of entity.attributes) {
        service.setAttribute(id, key, value);
      }
    }

    for (const relation of data.relations) {
      const fromId = entityId(relation.from);
      const toId = entityId(relation.to);
      const relationshipType = service.types.getRelationshipTypeByName(
        service.getEntity(fromId).typeId,
        service.getEntity(toId).typeId,
        relation.name
      );

      const id = service.createRelation(fromId, toId, relationshipType.id);
      relationIds.push(id);

      for (const { key, value } of relation.attributes) {
        service.setRelationAttribute(id, key, value);
      }
    }

    log.info(
      `Seeded ${data.types.length} types, ${data.entities.length} entities, ${relationIds.length} relations`
    );
    return {
      typeIds: Object.fromEntries(typeIds),
      entityIds: Object.fromEntries(entityIds),
      relationIds,
    };
  });
}
