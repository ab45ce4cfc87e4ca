/**
 * relation_create tool
 */

import { z } from 'zod';
import { GraphError } from '@graphdoc/shared';
import { registerTool } from '../tool-registry.js';
import { getService } from '../graph-service.js';
import { ToolValue } from './model-create.js';

export const RelationCreateInput = z.object({
  fromId: z.number().int().positive().describe('Entity the relation starts at'),
  toId: z.number().int().positive().describe('Entity the relation points to'),
  name: z.string().min(1).describe('Relationship type name, e.g. "works_for"'),
  attributes: z.record(ToolValue).optional().describe('Relation attribute values by key'),
});

export async function relationCreateTool(input: z.infer<typeof RelationCreateInput>) {
  const service = getService();

  const relationId = service.transaction(() => {
    const from = service.getEntity(input.fromId);
    const to = service.getEntity(input.toId);
    const candidates = service.findRelationshipTypes(input.name);

    // Prefer the declaration matching the endpoints; otherwise let the store report the mismatch
    const relationshipType =
      candidates.find(candidate => candidate.fromTypeId === from.typeId && candidate.toTypeId === to.typeId) ??
      candidates[0];
    if (!relationshipType) {
      throw new GraphError('UnknownType', `No relationship type named "${input.name}"`);
    }

    const id = service.createRelation(from.id, to.id, relationshipType.id);
    for (const [key, value] of Object.entries(input.attributes ?? {})) {
      service.setRelationAttribute(id, key, value);
    }
    return id;
  });

  return {
    success: true,
    relation: service.getRelation(relationId),
    attributes: service.getRelationAttributeValues(relationId).map(attribute => ({
      key: attribute.key,
      value: attribute.value.value,
    })),
  };
}

registerTool({
  name: 'relation_create',
  description: `Connect two entities with a named relationship.

The entities' base types must match the relationship type's declared endpoints.
Multiplicity is not checked: an entity may hold several relations of a "one" type.`,
  inputSchema: RelationCreateInput,
  handler: relationCreateTool,
});
